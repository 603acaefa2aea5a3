/**
 * CLI Commands - Public API
 */

export { executeCompileCommand, type CompileCommandDeps } from './compile.js';
export { executeCleanCommand, type CleanCommandDeps } from './clean.js';
