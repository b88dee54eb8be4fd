import { DeadlineExceededError } from "@groundline/errors";

/**
 * A wall-clock budget shared by every suspension point of one unit of work.
 * Exposes an AbortSignal for cancellable I/O and `race` for everything else.
 */
export class Deadline {
  readonly timeoutMs: number;
  readonly expiresAt: number;
  private readonly label: string;
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;

  constructor(timeoutMs: number, label = "operation") {
    this.timeoutMs = timeoutMs;
    this.label = label;
    this.expiresAt = Date.now() + timeoutMs;
    this.timer = setTimeout(() => {
      this.controller.abort(this.error());
    }, timeoutMs);
    this.timer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - Date.now());
  }

  throwIfExpired(): void {
    if (this.expired) {
      throw this.error();
    }
  }

  /**
   * Settle with `work`, or reject with DeadlineExceededError if the deadline
   * passes first. A late rejection from `work` is absorbed by this race.
   */
  race<T>(work: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(this.error());
      this.signal.addEventListener("abort", onAbort, { once: true });

      work.then(
        (value) => {
          this.signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          this.signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );

      if (this.signal.aborted) {
        reject(this.error());
      }
    });
  }

  dispose(): void {
    clearTimeout(this.timer);
  }

  private error(): DeadlineExceededError {
    return new DeadlineExceededError(
      `${this.label} exceeded its ${String(this.timeoutMs)}ms deadline`,
      this.timeoutMs,
    );
  }
}
