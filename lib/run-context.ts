import * as path from 'path';
import * as log from './util/log';
import { interpolate } from './util/template';
import { EnvironmentManager } from './environment-manager';
import { IToolInvoker } from './tool-invoker';

export interface RunContextOptions {
  /**
   * Directory relative paths are resolved against
   */
  readonly root: string;
  readonly tools: IToolInvoker;
  readonly services: EnvironmentManager;
  readonly params?: Record<string, string>;
  readonly signal?: AbortSignal;
}

/**
 * Everything a target can see while it runs
 *
 * Values produced by one target for later ones (a build number, an image
 * tag) are variables here, not globals.
 */
export class RunContext {
  public readonly root: string;
  public readonly tools: IToolInvoker;
  public readonly services: EnvironmentManager;
  public readonly params: Readonly<Record<string, string>>;
  public readonly signal?: AbortSignal;
  private readonly variables = new Map<string, string>();

  constructor(options: RunContextOptions) {
    this.root = path.resolve(options.root);
    this.tools = options.tools;
    this.services = options.services;
    this.params = { ...options.params };
    this.signal = options.signal;
  }

  public setVariable(name: string, value: string) {
    log.debug(`${name} = ${value}`);
    this.variables.set(name, value);
  }

  /**
   * A variable if a target set one by this name, otherwise a parameter
   */
  public lookup(name: string): string | undefined {
    return this.variables.get(name) ?? (Object.hasOwn(this.params, name) ? this.params[name] : undefined);
  }

  public interpolate(text: string): string {
    return interpolate(text, name => this.lookup(name));
  }

  public resolvePath(p: string) {
    return path.resolve(this.root, this.interpolate(p));
  }

  public get variableSnapshot(): Record<string, string> {
    return Object.fromEntries(this.variables);
  }
}
