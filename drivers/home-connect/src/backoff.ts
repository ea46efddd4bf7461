/**
 * Doubling delay, in seconds, with a ceiling. `attempts` counts the delays
 * handed out since the last reset.
 */
export class Backoff {
  private current: number;
  private count = 0;

  constructor(private readonly baseSeconds: number, private readonly maxSeconds: number) {
    this.current = baseSeconds;
  }

  get attempts(): number {
    return this.count;
  }

  next(): number {
    const value = Math.min(this.maxSeconds, this.current);
    this.current = Math.min(this.maxSeconds, Math.max(this.baseSeconds, this.current * 2));
    this.count += 1;
    return value;
  }

  reset(): void {
    this.current = this.baseSeconds;
    this.count = 0;
  }
}
