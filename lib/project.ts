import * as path from 'path';
import * as log from './util/log';
import { findFileUp, readJson } from './util/files';
import { errorMessage, SimpleError } from './util/flow';
import { createAction } from './actions';
import { ConfigError } from './errors';
import { EnvironmentManager, ManagedService } from './environment-manager';
import { RigJson, rigJsonSchema, ServiceDefinition } from './rig-schema';
import { RunContext } from './run-context';
import { TargetGraph } from './target-graph';
import { IToolInvoker } from './tool-invoker';

export const CONFIG_FILE = 'rig.json';

export interface ContextOptions {
  readonly tools: IToolInvoker;
  readonly params?: Record<string, string>;
  readonly signal?: AbortSignal;
}

/**
 * A rig.json file and the targets and services it declares
 */
export class Project {
  /**
   * Load the given config file, or the nearest rig.json up from the start directory
   */
  public static async load(configFile: string | undefined, startDir: string = process.cwd()): Promise<Project> {
    const file = configFile !== undefined ? path.resolve(configFile) : await findFileUp(CONFIG_FILE, startDir);
    if (file === undefined) {
      throw new SimpleError(`'${CONFIG_FILE}' not found upwards from '${startDir}'`);
    }
    log.debug(`Using ${file}`);

    let raw: unknown;
    try {
      raw = await readJson(file);
    } catch (e) {
      throw new ConfigError(errorMessage(e));
    }
    return Project.fromJson(raw, file);
  }

  public static fromJson(raw: unknown, file: string): Project {
    const parsed = rigJsonSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid ${file}`, parsed.error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`));
    }
    return new Project(path.dirname(path.resolve(file)), file, parsed.data);
  }

  public readonly graph = new TargetGraph();
  public readonly services: Record<string, ManagedService> = {};

  constructor(public readonly root: string, public readonly file: string, public readonly config: RigJson) {
    for (const [key, def] of Object.entries(config.services)) {
      this.services[key] = toManagedService(key, def);
    }

    for (const def of config.targets) {
      this.graph.register({
        name: def.name,
        dependsOn: def.dependsOn,
        description: def.description,
        action: createAction(def, this.services),
      });
    }
  }

  public get runtime() {
    return this.config.runtime;
  }

  /**
   * Services in declaration order, optionally only the named ones
   */
  public selectServices(names: string[] = []): ManagedService[] {
    if (names.length === 0) { return Object.values(this.services); }

    return names.map(name => {
      if (!Object.hasOwn(this.services, name)) {
        throw new SimpleError(`No such service: '${name}' (declared: ${Object.keys(this.services).join(', ') || 'none'})`);
      }
      return this.services[name];
    });
  }

  public environment(tools: IToolInvoker) {
    return new EnvironmentManager(tools, { runtime: this.runtime });
  }

  /**
   * A context for one run; command line parameters win over the defaults in rig.json
   */
  public createContext(options: ContextOptions): RunContext {
    return new RunContext({
      root: this.root,
      tools: options.tools,
      services: this.environment(options.tools),
      params: { ...this.config.params, ...options.params },
      signal: options.signal,
    });
  }
}

function toManagedService(key: string, def: ServiceDefinition): ManagedService {
  return {
    name: def.containerName ?? key,
    image: def.image,
    ports: def.ports,
    env: def.env,
    args: def.args,
    command: def.command,
  };
}
