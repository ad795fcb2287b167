import * as log from '../util/log';
import { Timer } from '../util/timer';
import { Project } from '../project';
import { StateStore } from '../state-store';
import { IToolInvoker } from '../tool-invoker';
import { formatPlan } from './inspect';

export interface RunOptions {
  readonly target: string;
  readonly tools: IToolInvoker;
  readonly params?: Record<string, string>;

  /**
   * Write a JSON report of the run here, whether it succeeded or not
   */
  readonly report?: string;

  /**
   * Only print what would run
   */
  readonly dryRun?: boolean;
  readonly signal?: AbortSignal;
}

export async function run(project: Project, options: RunOptions): Promise<StateStore | undefined> {
  const plan = project.graph.resolve(options.target);

  if (options.dryRun) {
    process.stdout.write(formatPlan(plan) + '\n');
    return undefined;
  }

  log.info(`${plan.targets.length} targets to run for '${plan.requested}'`);

  const ctx = project.createContext({ tools: options.tools, params: options.params, signal: options.signal });
  const store = new StateStore();
  const timer = new Timer(plan.requested);
  try {
    await project.graph.run(plan, ctx, store);
    log.success(`Finished '${plan.requested}' in ${humanDuration(timer)}`);
    return store;
  } finally {
    if (options.report !== undefined) {
      await store.writeReport(options.report, {
        requested: plan.requested,
        params: ctx.params,
        variables: ctx.variableSnapshot,
      });
      log.debug(`Report written to ${options.report}`);
    }
  }
}

function humanDuration(timer: Timer) {
  timer.stop();
  return timer.humanTime();
}
