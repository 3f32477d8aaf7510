/**
 * Time source for polling loops. Tests substitute a fake that advances on `wait`.
 */
export interface PollClock {
  now(): number;
  wait(ms: number): Promise<void>;
}

/**
 * Fixed-interval, deadline-bounded polling. No back-off, no jitter, no attempt cap.
 */
export interface PollPolicy {
  intervalMs: number;
  timeoutMs: number;
}

export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface PollHooks {
  /** Called after every completed fetch, before selection. */
  onPoll?: (poll: number, elapsedMs: number) => void;
  /** Transient fetch failures land here and are then ignored. */
  onError?: (error: unknown, poll: number) => void;
}

export interface PollRequest<TSnapshot, TResult> {
  /** Used in the timeout error message. */
  operation: string;
  policy: PollPolicy;
  clock: PollClock;
  fetch: () => Promise<TSnapshot>;
  /** Returns the accepted result, or `undefined` to keep polling. */
  select: (snapshot: TSnapshot, poll: number) => TResult | undefined;
  hooks?: PollHooks;
}
