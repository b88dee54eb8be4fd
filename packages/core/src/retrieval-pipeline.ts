import type CircuitBreaker from "opossum";
import {
  InvalidArgumentError,
  RetrievalDegradedError,
  createCircuitBreaker,
  errorMessage,
  isBreakerOpenError,
} from "@groundline/errors";
import { createSilentLogger } from "@groundline/logger";
import type { Logger } from "@groundline/logger";
import type { RetrievedResult } from "@groundline/types";
import type { IVectorIndex } from "@groundline/vector-index";

export interface RetrieverOptions {
  /** Per-search timeout enforced by the circuit breaker. */
  timeoutMs: number;
  logger?: Logger;
  /** Minimum calls in the rolling window before the breaker may open. */
  volumeThreshold?: number;
  resetTimeoutMs?: number;
}

/**
 * Query -> VectorIndex.search, behind a circuit breaker.
 *
 * Every failure other than a bad argument surfaces as RetrievalDegradedError so
 * callers can fall back to answering without context.
 */
export class Retriever {
  private readonly breaker: CircuitBreaker<[string, number], RetrievedResult[]>;
  private readonly logger: Logger;

  constructor(
    private readonly index: IVectorIndex,
    options: RetrieverOptions,
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.breaker = createCircuitBreaker(
      "retrieval",
      (query: string, k: number) => this.index.search(query, k),
      {
        timeout: options.timeoutMs,
        errorFilter: (err) => err instanceof InvalidArgumentError,
        ...(options.volumeThreshold !== undefined ? { volumeThreshold: options.volumeThreshold } : {}),
        ...(options.resetTimeoutMs !== undefined ? { resetTimeout: options.resetTimeoutMs } : {}),
      },
      (name, state) => {
        this.logger.warn({ breaker: name, state }, "Retrieval circuit changed state");
      },
    );
  }

  get isOpen(): boolean {
    return this.breaker.opened;
  }

  async retrieve(query: string, k: number): Promise<RetrievedResult[]> {
    try {
      return await this.breaker.fire(query, k);
    } catch (err: unknown) {
      if (err instanceof InvalidArgumentError || err instanceof RetrievalDegradedError) throw err;
      const reason = isBreakerOpenError(err) ? "retrieval circuit open" : errorMessage(err);
      throw new RetrievalDegradedError(`retrieval failed: ${reason}`, { cause: err });
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }
}
