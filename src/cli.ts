#!/usr/bin/env node
/**
 * texloop CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Hands argv to the command wiring (src/cli/run-cli.ts)
 * 2. Interprets the CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/application and src/domain.
 */

import os from 'os';

import { container, isInitialized } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { formatAppError } from './errors/formatter.js';
import { Err } from './errors/factories.js';

import { runCli } from './cli/run-cli.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { failure } from './cli/types/index.js';

// Used when the container never came up (usage and config errors) and for defects.
const bootTerminator = new NodeProcessTerminator();

function terminator(): ProcessTerminator {
  return isInitialized() ? container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator) : bootTerminator;
}

try {
  const result = await runCli(process.argv.slice(2), {
    runtimeMode: { kind: 'cli' },
    env: process.env,
    cwd: process.cwd(),
    tmpdir: os.tmpdir(),
  });
  interpretCliResult(result, terminator());
} catch (e) {
  interpretCliResult(
    failure(formatAppError(Err.unexpected('texloop stopped on an internal error', e))),
    bootTerminator
  );
}
