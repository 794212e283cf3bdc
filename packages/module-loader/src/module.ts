/**
 * Stepwise Module Loader - Module Base Class
 *
 * A Module is one constructed installer step: a variant chosen by the
 * factory, bound to a directory, initialised from its descriptor and given
 * its resolved configuration.
 *
 * Construction order (driven by ModuleFactory.build):
 * 1. the variant is allocated (no-arg constructor)
 * 2. bindLocation() assigns instance id and directory
 * 3. initFrom() copies common and variant-specific descriptor fields
 * 4. applyConfiguration() stores the configuration map and derives emergency
 *
 * Each step runs exactly once; a second call throws. After step 4 the
 * module's identity, kind, interface and configuration never change.
 */

import type {
  ConfigSearchContext,
  ConfigurationMap,
  Logger,
  ModuleDescriptor,
} from '@stepwise/kernel';
import { EMERGENCY_KEY, ModuleInterface, ModuleKind } from '@stepwise/kernel';
import { resolveConfiguration } from './config-resolver.js';
import { descriptorFlag, descriptorString, descriptorStringList } from './descriptor-values.js';

const TYPE_STRINGS: Readonly<Record<ModuleKind, string>> = {
  [ModuleKind.Job]: 'Job Module',
  [ModuleKind.View]: 'View Module',
};

const INTERFACE_STRINGS: Readonly<Record<ModuleInterface, string>> = {
  [ModuleInterface.QtPluginInterface]: 'Qt Plugin',
  [ModuleInterface.ProcessInterface]: 'External process',
  [ModuleInterface.PythonInterface]: 'Python (Boost.Python)',
  [ModuleInterface.PythonQtInterface]: 'Python (experimental)',
};

export abstract class Module {
  abstract readonly kind: ModuleKind;
  abstract readonly moduleInterface: ModuleInterface;

  private _name = '';
  private _instanceId = '';
  private _directory = '';
  private _requiredModules: ReadonlyArray<string> = [];
  private _configurationMap: ConfigurationMap = {};
  private _maybeEmergency: boolean | undefined;
  private _emergency = false;
  private _configurationPath: string | null = null;

  private located = false;
  private initialized = false;
  private configured = false;

  protected _loaded = false;

  // -------------------------------------------------------------------------
  // Identity
  // -------------------------------------------------------------------------

  get name(): string {
    return this._name;
  }

  /** Caller-assigned; differs from `name` when one module runs several times. */
  get instanceId(): string {
    return this._instanceId;
  }

  /** `name@instanceId`, unique among loaded modules. */
  get instanceKey(): string {
    return `${this._name}@${this._instanceId}`;
  }

  /** Absolute path of the module directory. */
  get directory(): string {
    return this._directory;
  }

  location(): string {
    return this._directory;
  }

  /** Names of modules that must run before this one, in descriptor order. */
  get requiredModules(): ReadonlyArray<string> {
    return this._requiredModules;
  }

  typeString(): string {
    return TYPE_STRINGS[this.kind];
  }

  interfaceString(): string {
    return INTERFACE_STRINGS[this.moduleInterface];
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  /** Parsed configuration; empty when no file was found or it supplied no keys. */
  get configurationMap(): ConfigurationMap {
    return this._configurationMap;
  }

  /** The configuration file that was used, or null if none was found. */
  get configurationPath(): string | null {
    return this._configurationPath;
  }

  /** The descriptor's `emergency` hint, if it had one. */
  get maybeEmergency(): boolean | undefined {
    return this._maybeEmergency;
  }

  /** True only when both the descriptor and the configuration say `emergency: true`. */
  get emergency(): boolean {
    return this._emergency;
  }

  get loaded(): boolean {
    return this._loaded;
  }

  toString(): string {
    return this.instanceKey;
  }

  // -------------------------------------------------------------------------
  // Construction steps
  // -------------------------------------------------------------------------

  /**
   * Assign the instance id (verbatim) and the already-validated absolute
   * module directory.
   */
  bindLocation(instanceId: string, directory: string): void {
    this.once('located', 'bindLocation');
    this._instanceId = instanceId;
    this._directory = directory;
  }

  /**
   * Copy descriptor fields: `name`, the `emergency` hint when present, and
   * `requiredModules`; then the variant's own keys.
   */
  initFrom(descriptor: ModuleDescriptor): void {
    this.once('initialized', 'initFrom');
    this._name = descriptorString(descriptor['name']);
    if (Object.hasOwn(descriptor, EMERGENCY_KEY)) {
      this._maybeEmergency = descriptorFlag(descriptor[EMERGENCY_KEY]);
    }
    this._requiredModules = descriptorStringList(descriptor['requiredModules']);
    this.initVariant(descriptor);
  }

  /**
   * Locate and parse this module's configuration file, then apply it.
   *
   * @throws {ConfigParseError} If the winning candidate is not valid YAML
   */
  loadConfigurationFile(
    configFileName: string,
    context: ConfigSearchContext,
    logger: Logger,
  ): void {
    const resolved = resolveConfiguration(context, this._name, configFileName, logger);
    this.applyConfiguration(resolved.configurationMap, resolved.path);
  }

  /**
   * Store the configuration map and derive the final emergency flag.
   */
  applyConfiguration(configurationMap: ConfigurationMap, path: string | null): void {
    this.once('configured', 'applyConfiguration');
    this._configurationMap = configurationMap;
    this._configurationPath = path;
    this._emergency =
      this._maybeEmergency === true &&
      Object.hasOwn(configurationMap, EMERGENCY_KEY) &&
      configurationMap[EMERGENCY_KEY] === true;
  }

  /** Read the variant's own descriptor keys. Called at the end of initFrom(). */
  protected abstract initVariant(descriptor: ModuleDescriptor): void;

  private once(step: 'located' | 'initialized' | 'configured', method: string): void {
    if (this[step]) {
      throw new Error(`Module.${method}() called twice for ${this.instanceKey}`);
    }
    this[step] = true;
  }
}
