import type { RunContext } from './run-context';

/**
 * Something a target does when it runs
 */
export interface ITargetAction {
  /**
   * Short human-readable summary, shown by 'plan' and 'list'
   */
  describe(): string;

  execute(ctx: RunContext): Promise<void>;
}

/**
 * A named, orderable unit of work
 */
export interface Target {
  readonly name: string;

  /**
   * Names of the targets that must have run before this one
   */
  readonly dependsOn: readonly string[];
  readonly description?: string;
  readonly action: ITargetAction;
}

/**
 * The targets to run for a requested target, dependencies first
 *
 * Each target appears once.
 */
export interface ExecutionPlan {
  readonly requested: string;
  readonly targets: readonly Target[];
}
