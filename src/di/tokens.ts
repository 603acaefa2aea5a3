/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Register a default in container.ts (guarded by isRegistered so tests can override)
 * 3. Resolve by token in the composition root only
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // PORTS (side effects; local adapters by default)
  // ═══════════════════════════════════════════════════════════════════
  Ports: {
    FileSystem: Symbol('Ports.FileSystem'),
    ContentHash: Symbol('Ports.ContentHash'),
    EngineRunner: Symbol('Ports.EngineRunner'),
    WorkspaceLock: Symbol('Ports.WorkspaceLock'),
    TimeClock: Symbol('Ports.TimeClock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // USE CASES
  // ═══════════════════════════════════════════════════════════════════
  UseCases: {
    /** Resolve → lock → converge → relocate */
    CompileDocument: Symbol('UseCases.CompileDocument'),
    /** Remove the temporary root */
    CleanWorkspaces: Symbol('UseCases.CleanWorkspaces'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    LoggerFactory: Symbol('Infra.LoggerFactory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (cli/test) */
    Mode: Symbol('Runtime.Mode'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
    /** SIGINT/SIGTERM/SIGHUP registration (composition roots only) */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;
