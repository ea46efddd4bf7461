export interface RecordedError {
  at: string;
  message: string;
  meta?: unknown;
}

/** Newest first, capped at `limit` entries. */
export class ErrorBuffer {
  private readonly errors: RecordedError[] = [];
  private count = 0;

  constructor(private readonly limit = 20) {}

  push(message: string, meta?: unknown): void {
    this.count += 1;
    this.errors.unshift({ at: new Date().toISOString(), message, meta });
    if (this.errors.length > this.limit) {
      this.errors.length = this.limit;
    }
  }

  /** Errors seen since start, including those no longer held. */
  get total(): number {
    return this.count;
  }

  list(): RecordedError[] {
    return [...this.errors];
  }
}
