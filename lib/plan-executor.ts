import * as log from './util/log';
import { errorMessage } from './util/flow';
import { Timer } from './util/timer';
import { TargetFailedError } from './errors';
import { StateStore } from './state-store';
import { ExecutionPlan, Target } from './target';

/**
 * Runs the targets of a plan one at a time, stopping at the first failure
 */
export class PlanExecutor {
  constructor(private readonly plan: ExecutionPlan, private readonly store: StateStore) {
    store.track(plan.targets.map(t => t.name));
  }

  public get size() { return this.plan.targets.length; }

  public async execute(cb: (target: Target) => Promise<void>): Promise<void> {
    log.debug(`Running ${this.size} targets for '${this.plan.requested}'`);

    for (const [i, target] of this.plan.targets.entries()) {
      log.info(`Run    ${target.name}`);
      const timer = new Timer(target.name);
      try {
        this.store.start(target.name);
        await cb(target);
      } catch (e) {
        this.store.fail(target.name, timer.stop(), errorMessage(e));
        log.error(`Failed ${target.name} (${timer.humanTime()})`);

        const skipped = this.plan.targets.slice(i + 1);
        if (skipped.length > 0) {
          log.warning(`Not running ${skipped.length} remaining targets (${describeTargets(skipped)})`);
        }
        throw new TargetFailedError(target.name, e);
      }
      this.store.succeed(target.name, timer.stop());
      log.info(`Finish ${target.name} (${timer.humanTime()})`);
    }
  }
}

function describeTargets(targets: readonly Target[]) {
  const names = targets.map(n => n.name);
  if (names.length > 7) {
    names.splice(3, names.length - 6, '...');
  }
  return names.join(', ');
}
