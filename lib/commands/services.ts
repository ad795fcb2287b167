import * as log from '../util/log';
import { ServiceState, ServiceTransition } from '../environment-manager';
import { Project } from '../project';
import { IToolInvoker } from '../tool-invoker';

export type ServicesOperation = 'status' | 'up' | 'stop' | 'rm';

export const SERVICE_OPERATIONS: readonly ServicesOperation[] = ['status', 'up', 'stop', 'rm'];

/**
 * Lifecycle control for declared services, outside of any target
 *
 * Without names, applies to every declared service. 'rm' goes in reverse
 * declaration order.
 */
export async function services(project: Project, tools: IToolInvoker, operation: ServicesOperation, names: string[] = []) {
  const env = project.environment(tools);
  const selected = project.selectServices(names);

  if (selected.length === 0) {
    log.warning('No services declared');
    return;
  }

  switch (operation) {
    case 'status':
      process.stdout.write(formatStatus(await env.status(selected)) + '\n');
      return;
    case 'up':
      for (const s of selected) { logTransition(await env.runOrStart(s)); }
      return;
    case 'stop':
      for (const s of selected) { logTransition(await env.stop(s)); }
      return;
    case 'rm':
      for (const t of await env.teardown(selected)) { logTransition(t); }
      return;
  }
}

export function formatStatus(states: Array<{ service: string; state: ServiceState }>): string {
  const width = Math.max(0, ...states.map(s => s.service.length));
  return states.map(s => `${s.service.padEnd(width)}  ${s.state}`).join('\n');
}

function logTransition(t: ServiceTransition) {
  if (t.action === 'none') {
    log.info(`${t.service}: already ${t.to}`);
  } else {
    log.info(`${t.service}: ${t.action}`);
  }
}
