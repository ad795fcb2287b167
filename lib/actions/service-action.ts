import * as log from '../util/log';
import { ManagedService, ServiceTransition } from '../environment-manager';
import { ServiceOperation } from '../rig-schema';
import { RunContext } from '../run-context';
import { ITargetAction } from '../target';

/**
 * Bring a declared service up, stop it or remove it
 */
export class ServiceAction implements ITargetAction {
  constructor(private readonly service: ManagedService, private readonly operation: ServiceOperation) {
  }

  public describe() {
    return `${this.operation} service ${this.service.name} (${this.service.image})`;
  }

  public async execute(ctx: RunContext): Promise<void> {
    const service = resolveService(this.service, ctx);

    const transition = await this.apply(service, ctx);
    if (transition.action === 'none') {
      log.info(`Service ${service.name} already ${transition.to}`);
    } else {
      log.info(`Service ${service.name} ${transition.action} (was ${transition.from})`);
    }
  }

  private apply(service: ManagedService, ctx: RunContext): Promise<ServiceTransition> {
    switch (this.operation) {
      case 'up': return ctx.services.runOrStart(service);
      case 'stop': return ctx.services.stop(service);
      case 'remove': return ctx.services.remove(service);
    }
  }
}

/**
 * Fill in build variables and parameters in the parts of a service that may use them
 */
function resolveService(service: ManagedService, ctx: RunContext): ManagedService {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(service.env ?? {})) {
    env[key] = ctx.interpolate(value);
  }
  return {
    ...service,
    image: ctx.interpolate(service.image),
    env,
    args: service.args?.map(a => ctx.interpolate(a)),
    command: service.command?.map(a => ctx.interpolate(a)),
  };
}
