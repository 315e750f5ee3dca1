import { getEnvironment } from '../config/environment.js';

export interface RetryPassPolicy {
  /** 0 keeps polling until every item resolves. */
  maxPasses: number;
  passDelayMs: number;
  stuckAfterPasses: number;
}

export interface RetryPassReport {
  stage: string;
  pass: number;
  pending: number;
  resolved: number;
  stuck: boolean;
}

export type RetryPassObserver = (report: RetryPassReport) => void;

export interface RetryPassResult<T> {
  unresolved: T[];
  passes: number;
  exhausted: boolean;
}

export interface RetryPassOptions<T> {
  stage: string;
  pending: T[];
  /** Resolves true once the item no longer needs another pass. */
  attempt: (item: T, pass: number) => Promise<boolean>;
  policy: RetryPassPolicy;
  observer?: RetryPassObserver;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Polls a shrinking set of items one sequential pass at a time until all of
 * them resolve or the pass ceiling is hit.
 */
export async function runRetryPasses<T>(options: RetryPassOptions<T>): Promise<RetryPassResult<T>> {
  const { stage, attempt, policy, observer } = options;
  const sleep = options.sleep ?? defaultSleep;

  let pending = options.pending;
  let passes = 0;

  while (pending.length > 0) {
    if (policy.maxPasses > 0 && passes >= policy.maxPasses) {
      return { unresolved: pending, passes, exhausted: true };
    }

    if (passes > 0 && policy.passDelayMs > 0) {
      await sleep(policy.passDelayMs);
    }

    passes++;
    const stillPending: T[] = [];

    for (const item of pending) {
      if (!(await attempt(item, passes))) {
        stillPending.push(item);
      }
    }

    observer?.({
      stage,
      pass: passes,
      pending: stillPending.length,
      resolved: pending.length - stillPending.length,
      stuck: stillPending.length > 0 && passes >= policy.stuckAfterPasses,
    });

    pending = stillPending;
  }

  return { unresolved: [], passes, exhausted: false };
}

export function retryPassPolicyFromEnvironment(
  overrides: Partial<RetryPassPolicy> = {},
): RetryPassPolicy {
  const env = getEnvironment();

  return {
    maxPasses: overrides.maxPasses ?? env.EDGAR_RETRY_MAX_PASSES,
    passDelayMs: overrides.passDelayMs ?? env.EDGAR_RETRY_PASS_DELAY_MS,
    stuckAfterPasses: overrides.stuckAfterPasses ?? env.EDGAR_RETRY_STUCK_AFTER_PASSES,
  };
}
