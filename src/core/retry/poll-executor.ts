import { setTimeout as delay } from "timers/promises";
import { TimeoutError } from "../../types/error/echo-relay-error";
import type { PollClock, PollRequest } from "./poll-types";

export const systemClock: PollClock = {
  now: () => Date.now(),
  wait: async (ms: number) => {
    await delay(ms);
  },
};

/**
 * Sleeps one interval, fetches, and asks `select` whether the answer has
 * arrived, until the deadline passes.
 *
 * A fetch failure never ends the loop; it is reported through `onError` and
 * the next interval proceeds. The deadline is measured from the first call to
 * `clock.now()`, so the loop can overrun it by at most one interval plus one
 * fetch.
 *
 * @throws TimeoutError when the deadline passes without an accepted result.
 */
export async function pollUntil<TSnapshot, TResult>(
  request: PollRequest<TSnapshot, TResult>,
): Promise<TResult> {
  const { clock, policy, hooks } = request;
  const start = clock.now();
  const deadline = start + policy.timeoutMs;
  let poll = 0;

  while (clock.now() < deadline) {
    await clock.wait(policy.intervalMs);
    poll += 1;

    let snapshot: TSnapshot;
    try {
      snapshot = await request.fetch();
    } catch (error: unknown) {
      hooks?.onError?.(error, poll);
      continue;
    }

    hooks?.onPoll?.(poll, clock.now() - start);
    const result = request.select(snapshot, poll);
    if (result !== undefined) {
      return result;
    }
  }

  throw new TimeoutError(request.operation, policy.timeoutMs, poll);
}
