import * as log from './util/log';
import { ServiceLifecycleError } from './errors';
import { ExternalProcessResult, IToolInvoker } from './tool-invoker';

export type ServiceState = 'running' | 'stopped' | 'absent';

export interface PortMapping {
  readonly host: number;
  readonly container: number;
  readonly protocol?: 'tcp' | 'udp';
}

/**
 * A local service that other targets depend on, run as a container
 */
export interface ManagedService {
  /**
   * Container name; also how the service is found again
   */
  readonly name: string;
  readonly image: string;
  readonly ports?: PortMapping[];
  readonly env?: Record<string, string>;

  /**
   * Extra arguments to 'run', placed before the image
   */
  readonly args?: string[];

  /**
   * Arguments after the image (the container's command)
   */
  readonly command?: string[];
}

export type TransitionAction = 'created' | 'started' | 'stopped' | 'removed' | 'none';

export interface ServiceTransition {
  readonly service: string;
  readonly from: ServiceState;
  readonly to: ServiceState;
  readonly action: TransitionAction;
}

export interface EnvironmentManagerOptions {
  /**
   * Container runtime CLI
   *
   * @default 'docker'
   */
  readonly runtime?: string;
}

/**
 * Idempotent lifecycle control for containerized services
 *
 * Every operation first asks the runtime what state the service is in and
 * then does only what is needed to get to the requested state.
 */
export class EnvironmentManager {
  public readonly runtime: string;

  constructor(private readonly tools: IToolInvoker, options: EnvironmentManagerOptions = {}) {
    this.runtime = options.runtime ?? 'docker';
  }

  public async isRunning(service: ManagedService): Promise<boolean> {
    const result = await this.query(service, ['ps', '--quiet', '--filter', nameFilter(service), '--filter', 'status=running']);
    return result.stdout.trim() !== '';
  }

  public async exists(service: ManagedService): Promise<boolean> {
    const result = await this.query(service, ['ps', '--all', '--quiet', '--filter', nameFilter(service)]);
    return result.stdout.trim() !== '';
  }

  public async state(service: ManagedService): Promise<ServiceState> {
    if (await this.isRunning(service)) { return 'running'; }
    if (await this.exists(service)) { return 'stopped'; }
    return 'absent';
  }

  public async runOrStart(service: ManagedService): Promise<ServiceTransition> {
    const from = await this.state(service);
    switch (from) {
      case 'running':
        log.debug(`${service.name} is already running`);
        return { service: service.name, from, to: from, action: 'none' };
      case 'stopped':
        await this.invoke(service, from, 'start', ['start', service.name]);
        return this.expect(service, from, 'running', 'started');
      case 'absent':
        await this.invoke(service, from, 'create', runArguments(service));
        return this.expect(service, from, 'running', 'created');
    }
  }

  public async stop(service: ManagedService): Promise<ServiceTransition> {
    const from = await this.state(service);
    if (from !== 'running') {
      log.debug(`${service.name} is ${from}, nothing to stop`);
      return { service: service.name, from, to: from, action: 'none' };
    }

    await this.invoke(service, from, 'stop', ['stop', service.name]);
    return this.expect(service, from, 'stopped', 'stopped');
  }

  public async remove(service: ManagedService): Promise<ServiceTransition> {
    const from = await this.state(service);
    if (from === 'absent') {
      log.debug(`${service.name} is absent, nothing to remove`);
      return { service: service.name, from, to: from, action: 'none' };
    }

    await this.invoke(service, from, 'remove', ['rm', '--force', service.name]);
    return this.expect(service, from, 'absent', 'removed');
  }

  /**
   * Remove every service, last declared first
   */
  public async teardown(services: ManagedService[]): Promise<ServiceTransition[]> {
    const ret = new Array<ServiceTransition>();
    for (const service of [...services].reverse()) {
      ret.push(await this.remove(service));
    }
    return ret;
  }

  public async status(services: ManagedService[]): Promise<Array<{ service: string; state: ServiceState }>> {
    const ret = [];
    for (const service of services) {
      ret.push({ service: service.name, state: await this.state(service) });
    }
    return ret;
  }

  private async query(service: ManagedService, args: string[]): Promise<ExternalProcessResult> {
    const result = await this.tools.run(this.runtime, args);
    if (result.exitCode !== 0) {
      throw new ServiceLifecycleError(service.name, `could not query state: ${firstLine(result.output)}`, undefined, result);
    }
    return result;
  }

  private async invoke(service: ManagedService, state: ServiceState, verb: string, args: string[]) {
    log.info(`${capitalize(verb)} service ${service.name}`);
    const result = await this.tools.run(this.runtime, args);
    if (result.exitCode !== 0) {
      throw new ServiceLifecycleError(service.name, `${verb} failed while ${state}: ${firstLine(result.output)}`, state, result);
    }
  }

  private async expect(service: ManagedService, from: ServiceState, to: ServiceState, action: TransitionAction): Promise<ServiceTransition> {
    const actual = await this.state(service);
    if (actual !== to) {
      throw new ServiceLifecycleError(service.name, `expected to be ${to} after it was ${action}, but it is ${actual}`, actual);
    }
    return { service: service.name, from, to, action };
  }
}

export function runArguments(service: ManagedService): string[] {
  const ret = ['run', '--detach', '--name', service.name];
  for (const port of service.ports ?? []) {
    ret.push('-p', `${port.host}:${port.container}${port.protocol === 'udp' ? '/udp' : ''}`);
  }
  for (const [key, value] of Object.entries(service.env ?? {})) {
    ret.push('-e', `${key}=${value}`);
  }
  ret.push(...service.args ?? [], service.image, ...service.command ?? []);
  return ret;
}

/**
 * The runtime matches the name filter as a regular expression
 */
export function nameFilter(service: ManagedService) {
  return `name=^/${escapeRegExp(service.name)}$`;
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^$|()[\]{}\\]/g, '\\$&');
}

function firstLine(s: string) {
  return s.trim().split('\n')[0] || '(no output)';
}

function capitalize(s: string) {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
