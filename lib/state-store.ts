import { writeJson } from './util/files';
import { SimpleError } from './util/flow';

export type TargetState = 'pending' | 'running' | 'succeeded' | 'failed';

export interface TargetRecord {
  readonly name: string;
  readonly state: TargetState;
  readonly startedAt?: string;
  readonly finishedAt?: string;
  readonly durationMs?: number;
  readonly error?: string;
}

const ALLOWED_TRANSITIONS: Record<TargetState, TargetState[]> = {
  pending: ['running', 'failed'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

/**
 * What happened to each target during a session of one or more runs
 *
 * Only for reporting; nothing reads it back to decide what to run.
 */
export class StateStore {
  private readonly _records = new Map<string, TargetRecord>();

  constructor(private readonly clock: () => Date = () => new Date()) {
  }

  /**
   * Start tracking the targets of a new plan
   *
   * A target that finished in an earlier plan is pending again, since the new
   * plan runs it again.
   */
  public track(names: Iterable<string>) {
    for (const name of names) {
      if (this._records.get(name)?.state === 'running') {
        throw new SimpleError(`Target '${name}' is still running`);
      }
      this._records.set(name, { name, state: 'pending' });
    }
  }

  public start(name: string) {
    this.transition(name, 'running', { startedAt: this.clock().toISOString() });
  }

  public succeed(name: string, durationMs: number) {
    this.transition(name, 'succeeded', { finishedAt: this.clock().toISOString(), durationMs });
  }

  public fail(name: string, durationMs: number, error: string) {
    this.transition(name, 'failed', { finishedAt: this.clock().toISOString(), durationMs, error });
  }

  public get(name: string): TargetRecord | undefined {
    return this._records.get(name);
  }

  public records(): TargetRecord[] {
    return Array.from(this._records.values());
  }

  /**
   * Names of the targets that succeeded, in the order they were tracked
   */
  public completed(): string[] {
    return this.records().filter(r => r.state === 'succeeded').map(r => r.name);
  }

  public summary(): Record<TargetState, number> {
    const ret: Record<TargetState, number> = { pending: 0, running: 0, succeeded: 0, failed: 0 };
    for (const r of this._records.values()) {
      ret[r.state] += 1;
    }
    return ret;
  }

  public async writeReport(filename: string, extra: Record<string, unknown> = {}) {
    await writeJson(filename, {
      ...extra,
      summary: this.summary(),
      targets: this.records(),
    });
  }

  private transition(name: string, to: TargetState, fields: Partial<TargetRecord>) {
    const current = this._records.get(name);
    if (!current) {
      throw new Error(`Target not tracked: ${name}`);
    }
    if (!ALLOWED_TRANSITIONS[current.state].includes(to)) {
      throw new Error(`Target '${name}' cannot go from ${current.state} to ${to}`);
    }
    this._records.set(name, { ...current, ...fields, state: to });
  }
}
