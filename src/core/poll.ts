export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  /** Called after each negative check, with the error if the check threw. */
  onRetry?: (attempt: number, error?: unknown) => void;
}

export interface PollResult {
  satisfied: boolean;
  attempts: number;
}

/**
 * Run `check` up to `maxAttempts` times, waiting `intervalMs` between
 * attempts, and stop at the first `true`. A check that throws counts as
 * `false`.
 */
export async function pollUntil(check: () => Promise<boolean>, options: PollOptions): Promise<PollResult> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    let satisfied = false;
    let failure: unknown;
    try {
      satisfied = await check();
    } catch (error) {
      failure = error;
    }
    if (satisfied) {
      return { satisfied: true, attempts: attempt };
    }
    options.onRetry?.(attempt, failure);
    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs);
    }
  }
  return { satisfied: false, attempts: options.maxAttempts };
}
