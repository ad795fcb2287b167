import { RunContext } from '../run-context';
import { ITargetAction } from '../target';

/**
 * Does nothing itself; a name for running its dependencies
 */
export class GroupAction implements ITargetAction {
  constructor(private readonly dependsOn: readonly string[]) {
  }

  public describe() {
    return this.dependsOn.length > 0 ? `(group of ${this.dependsOn.join(', ')})` : '(group)';
  }

  public async execute(_ctx: RunContext): Promise<void> {
    return;
  }
}
