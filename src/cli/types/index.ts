export type { ExitCode } from './exit-code.js';
export { toTermination } from './exit-code.js';

export type { CliOutput, CliResult, FailureOptions } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';
