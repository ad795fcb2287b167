/**
 * A single timer
 */
export class Timer {
  public durationMs?: number;
  private readonly startTime: number;

  constructor(public readonly label: string) {
    this.startTime = Date.now();
  }

  public stop(): number {
    if (this.durationMs === undefined) {
      this.durationMs = Date.now() - this.startTime;
    }
    return this.durationMs;
  }

  public humanTime() {
    if (this.durationMs === undefined) { return '???'; }
    return humanTime(this.durationMs);
  }
}

export function humanTime(ms: number) {
  let time = ms / 1000;
  const parts = [];

  if (time >= 60) {
    const mins = Math.floor(time / 60);
    parts.push(mins + 'm');
    time -= mins * 60;
  }
  parts.push(time.toFixed(1) + 's');

  return parts.join('');
}
