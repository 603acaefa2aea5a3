import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer, type InjectionToken } from 'tsyringe';
import { ok, err, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ContentHashPort } from '../ports/content-hash.port.js';
import type { EngineRunnerPort } from '../ports/engine-runner.port.js';
import type { WorkspaceLockPort } from '../ports/workspace-lock.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { StreamingContentHasher } from '../infra/local/content-hash/index.js';
import { ChildProcessEngineRunner } from '../infra/local/engine-runner/index.js';
import { LocalWorkspaceLock } from '../infra/local/workspace-lock/index.js';
import { ProcessClock } from '../infra/local/time-clock/index.js';
import { WorkspaceResolver } from '../domain/workspace-resolver.js';
import { createCompileDocumentUseCase, type CompileDocument } from '../application/compile-document.js';
import { createCleanWorkspacesUseCase, type CleanWorkspaces } from '../application/clean-workspaces.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  readonly tmpdir: string;
}

/**
 * Register `provider` under `token` unless something (usually a test) got there first.
 */
function registerDefault<T>(
  token: InjectionToken<T>,
  factory: (c: DependencyContainer) => T
): void {
  if (!container.isRegistered(token)) {
    container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env: options.env, cwd: options.cwd, tmpdir: options.tmpdir });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode(options.env);
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  // Tests may register a recording stand-in first.
  if (!container.isRegistered(DI.Runtime.ProcessSignals)) {
    const signals: ProcessSignals = mode.kind === 'test' ? new NoopProcessSignals() : new NodeProcessSignals();
    container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PORTS + USE CASES
// ═══════════════════════════════════════════════════════════════════════════

function registerPorts(): void {
  registerDefault<ILoggerFactory>(DI.Infra.LoggerFactory, (c) =>
    new PinoLoggerFactory(c.resolve<ValidatedConfig>(DI.Config.App).logging.level)
  );
  registerDefault<FileSystemPort>(DI.Ports.FileSystem, () => new NodeFileSystem());
  registerDefault<ContentHashPort>(DI.Ports.ContentHash, () => new StreamingContentHasher());
  registerDefault<EngineRunnerPort>(DI.Ports.EngineRunner, () => new ChildProcessEngineRunner());
  registerDefault<TimeClockPort>(DI.Ports.TimeClock, () => new ProcessClock());
  registerDefault<WorkspaceLockPort>(DI.Ports.WorkspaceLock, (c) =>
    new LocalWorkspaceLock(c.resolve<FileSystemPort>(DI.Ports.FileSystem), c.resolve<TimeClockPort>(DI.Ports.TimeClock))
  );
}

function registerUseCases(): void {
  registerDefault<CompileDocument>(DI.UseCases.CompileDocument, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    const fs = c.resolve<FileSystemPort>(DI.Ports.FileSystem);
    const loggers = c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory);
    return createCompileDocumentUseCase({
      engine: config.engine,
      cwd: config.paths.cwd,
      outputFormat: config.output.format,
      resolver: new WorkspaceResolver(config.paths.tempRoot, fs),
      fs,
      hasher: c.resolve<ContentHashPort>(DI.Ports.ContentHash),
      runner: c.resolve<EngineRunnerPort>(DI.Ports.EngineRunner),
      lock: c.resolve<WorkspaceLockPort>(DI.Ports.WorkspaceLock),
      logger: loggers.create('compile'),
    });
  });

  registerDefault<CleanWorkspaces>(DI.UseCases.CleanWorkspaces, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return createCleanWorkspacesUseCase({
      tempRoot: config.paths.tempRoot,
      fs: c.resolve<FileSystemPort>(DI.Ports.FileSystem),
      logger: c.resolve<ILoggerFactory>(DI.Infra.LoggerFactory).create('clean'),
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire everything. Idempotent; a config error is returned, never thrown or exited on.
 */
export function initializeContainer(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const configured = registerConfig(options);
  if (configured.isErr()) return configured;

  registerRuntime(options);
  registerPorts();
  registerUseCases();

  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  container
    .resolve<ILoggerFactory>(DI.Infra.LoggerFactory)
    .create('container')
    .debug({ tempRoot: config.paths.tempRoot, engine: config.engine }, 'Using temporary root');

  initialized = true;
  return ok(undefined);
}

/**
 * Drop every registration (tests).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
