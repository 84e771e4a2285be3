import { describeError } from "../shared/errors";

export interface PollLoopOptions {
  intervalMs: number;
  tick: () => Promise<unknown>;
  /** Checked before each iteration; the loop runs forever without it. */
  shouldContinue?: () => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs `tick` every `intervalMs`. Iterations never overlap: the wait starts
 * after the previous tick settled.
 */
export async function runPollLoop(options: PollLoopOptions): Promise<number> {
  if (options.intervalMs <= 0) {
    throw new Error("Poll interval must be greater than zero");
  }

  const sleep = options.sleep ?? delay;
  const shouldContinue = options.shouldContinue ?? (() => true);
  let iteration = 0;

  while (shouldContinue()) {
    iteration += 1;
    try {
      await options.tick();
    } catch (error) {
      console.error(`Poll iteration #${iteration} failed: ${describeError(error)}`);
    }

    if (!shouldContinue()) {
      break;
    }
    await sleep(options.intervalMs);
  }

  return iteration;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
