import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of requests in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Return true for errors that should not count as failures (e.g. caller mistakes). */
  errorFilter?: (err: unknown) => boolean;
}

export type BreakerEventListener = (name: string, state: "open" | "halfOpen" | "close") => void;

const DEFAULT_OPTIONS: Required<
  Pick<
    CircuitBreakerOptions,
    "timeout" | "errorThresholdPercentage" | "resetTimeout" | "volumeThreshold"
  >
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

function defaultListener(name: string, state: "open" | "halfOpen" | "close"): void {
  console.warn(`[circuit-breaker] ${name}: circuit ${state.toUpperCase()}`);
}

export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
  onStateChange: BreakerEventListener = defaultListener,
): CircuitBreaker<TI, TR> {
  const mergedOptions = { ...DEFAULT_OPTIONS, ...options, name };

  const breaker = new CircuitBreaker<TI, TR>(fn, mergedOptions);

  breaker.on("open", () => onStateChange(name, "open"));
  breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
  breaker.on("close", () => onStateChange(name, "close"));

  return breaker;
}

/**
 * opossum rejects short-circuited calls with an Error whose `code` is EOPENBREAKER.
 */
export function isBreakerOpenError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EOPENBREAKER";
}
