/**
 * Stepwise Kernel - Module Types
 *
 * Defines the module kinds, execution interfaces, the raw descriptor shape
 * and the backend capability record consulted by the factory.
 *
 * A module is one installer step. Its `module.desc` descriptor names the
 * kind of work it does (a state-changing job or a user-facing view) and the
 * mechanism it runs on (native plugin, external process, scripting engine).
 * Not every kind/interface pair exists; the factory owns that table.
 */

// ---------------------------------------------------------------------------
// Module Kind
// ---------------------------------------------------------------------------

/**
 * The category of work a module performs.
 */
export enum ModuleKind {
  /** Performs a state-changing action during installation. */
  Job = 'Job',
  /** Presents a user-facing step. */
  View = 'View',
}

// ---------------------------------------------------------------------------
// Module Interface
// ---------------------------------------------------------------------------

/**
 * The execution mechanism a module uses.
 */
export enum ModuleInterface {
  QtPluginInterface = 'QtPluginInterface',
  ProcessInterface = 'ProcessInterface',
  PythonInterface = 'PythonInterface',
  PythonQtInterface = 'PythonQtInterface',
}

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

/**
 * The raw, externally supplied module descriptor.
 *
 * Values are untyped: descriptors are usually parsed from a YAML file by a
 * collaborator and are only narrowed by the validator and the variants that
 * read their own keys. The core never mutates a descriptor.
 *
 * Recognised keys: `type`, `interface` (required), `name`, `emergency`,
 * `requiredModules`, plus variant-specific keys such as `command` or `script`.
 */
export type ModuleDescriptor = Readonly<Record<string, unknown>>;

/**
 * A parsed configuration document. Keys other than `emergency` are opaque
 * to the core and passed through unchanged.
 */
export type ConfigurationMap = Readonly<Record<string, unknown>>;

/** Reserved key read from both the descriptor and the configuration map. */
export const EMERGENCY_KEY = 'emergency';

// ---------------------------------------------------------------------------
// Backend Support
// ---------------------------------------------------------------------------

/**
 * Optional execution backends available to this build.
 *
 * When a backend is absent, descriptors asking for it are rejected with
 * UnsupportedInterface instead of producing a module that cannot run.
 */
export interface BackendSupport {
  /** Scripting job modules (`job` / `python`). */
  readonly python: boolean;
  /** Scripting UI modules (`view` / `pythonqt`). */
  readonly pythonQt: boolean;
}

/** The default build ships the scripting job backend but not scripting UI. */
export const DEFAULT_BACKEND_SUPPORT: BackendSupport = {
  python: true,
  pythonQt: false,
};
