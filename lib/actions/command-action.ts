import * as log from '../util/log';
import { commandLine } from '../errors';
import { CommandTargetDefinition } from '../rig-schema';
import { RunContext } from '../run-context';
import { ITargetAction } from '../target';

/**
 * Run one external tool; any non-zero exit fails the target
 */
export class CommandAction implements ITargetAction {
  constructor(private readonly def: CommandTargetDefinition) {
  }

  public describe() {
    return commandLine({ command: this.def.command, args: this.def.args });
  }

  public async execute(ctx: RunContext): Promise<void> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.def.env)) {
      env[key] = ctx.interpolate(value);
    }

    const result = await ctx.tools.run(
      ctx.interpolate(this.def.command),
      this.def.args.map(a => ctx.interpolate(a)),
      {
        cwd: ctx.resolvePath(this.def.cwd ?? '.'),
        env,
        strict: true,
        echo: this.def.echo,
      });

    if (this.def.captureAs !== undefined) {
      const value = result.stdout.trim();
      ctx.setVariable(this.def.captureAs, value);
      log.info(`${this.def.captureAs} = ${value}`);
    }
  }
}
