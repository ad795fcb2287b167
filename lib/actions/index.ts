import { ConfigError } from '../errors';
import { ManagedService } from '../environment-manager';
import { TargetDefinition } from '../rig-schema';
import { ITargetAction } from '../target';
import { CommandAction } from './command-action';
import { GroupAction } from './group-action';
import { ServiceAction } from './service-action';

export * from './command-action';
export * from './group-action';
export * from './service-action';

export function createAction(def: TargetDefinition, services: Record<string, ManagedService>): ITargetAction {
  switch (def.type) {
    case 'command':
      return new CommandAction(def);
    case 'service': {
      if (!Object.hasOwn(services, def.service)) {
        throw new ConfigError(`Target '${def.name}' uses undeclared service '${def.service}'`);
      }
      return new ServiceAction(services[def.service], def.action);
    }
    case 'group':
      return new GroupAction(def.dependsOn);
  }
}
