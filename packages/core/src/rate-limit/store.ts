export interface RateWindow {
  /** Epoch ms at which the current window opened. */
  windowStart: number;
  /** Permits consumed since `windowStart`. */
  count: number;
}

/**
 * Window state keyed by limiter key. Synchronous on purpose: the limiter reads
 * and writes a window in one step, and an `await` between the two would let
 * another request slip in.
 */
export interface RateWindowStore {
  get(key: string): RateWindow | undefined;
  set(key: string, window: RateWindow): void;
  delete(key: string): void;
  clear(): void;
}
