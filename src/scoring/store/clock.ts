/**
 * Wall clock that never repeats or goes backwards within a process,
 * so two records appended back to back get distinct, ordered timestamps.
 */

export class MonotonicClock {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  nextMillis(): number {
    const t = this.now();
    this.last = t > this.last ? t : this.last + 1;
    return this.last;
  }

  nextISO(): string {
    return new Date(this.nextMillis()).toISOString();
  }
}
