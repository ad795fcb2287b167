import { SimpleError, errorMessage } from './util/flow';
import type { ExternalProcessResult } from './tool-invoker';
import type { ServiceState } from './environment-manager';

export class UnknownTargetError extends SimpleError {
  constructor(public readonly targetName: string, public readonly requiredBy?: string) {
    super(requiredBy !== undefined
      ? `Target '${requiredBy}' depends on unknown target '${targetName}'`
      : `No such target: '${targetName}'`);
  }
}

export class DuplicateTargetError extends SimpleError {
  constructor(public readonly targetName: string) {
    super(`Target '${targetName}' is defined more than once`);
  }
}

export class CycleError extends SimpleError {
  /**
   * The names along the cycle, with the first name repeated at the end
   */
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle: ${cycle.join(' -> ')}`);
    this.cycle = cycle;
  }
}

export class ExternalToolFailure extends SimpleError {
  constructor(public readonly result: ExternalProcessResult) {
    super(`'${commandLine(result)}' exited with code ${result.exitCode}`);
  }
}

export class ServiceLifecycleError extends SimpleError {
  constructor(
    public readonly serviceName: string,
    message: string,
    public readonly state?: ServiceState,
    public readonly result?: ExternalProcessResult) {
    super(`Service '${serviceName}': ${message}`);
  }
}

export class ConfigError extends SimpleError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message);
  }
}

/**
 * A target in a plan failed; the plan was aborted at that point
 */
export class TargetFailedError extends SimpleError {
  constructor(public readonly targetName: string, public readonly reason: unknown) {
    super(`Target '${targetName}' failed: ${errorMessage(reason)}`);
  }
}

/**
 * Render a result's command the way a user would type it
 */
export function commandLine(result: Pick<ExternalProcessResult, 'command' | 'args'>) {
  return [result.command, ...result.args].map(shellQuote).join(' ');
}

function shellQuote(s: string) {
  if (s !== '' && /^[A-Za-z0-9_./:=@%+,^{}-]+$/.test(s)) { return s; }
  return `'${s.replace(/'/g, `'\\''`)}'`;
}
