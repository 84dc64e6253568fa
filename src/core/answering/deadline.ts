/**
 * Deadline helpers: bounded waits and a fan-out whose results stay aligned
 * with its inputs.
 */

import { TIMEOUT_ANSWER, unexpectedErrorAnswer } from './errors';

export type DeadlineResult<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Wait for a promise for at most `ms`. The promise keeps running after a
 * timeout; its eventual rejection is the caller's to handle.
 */
export async function withDeadline<T>(promise: Promise<T>, ms: number): Promise<DeadlineResult<T>> {
  if (ms <= 0) return { timedOut: true };

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<DeadlineResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), ms);
  });

  try {
    return await Promise.race([
      promise.then((value): DeadlineResult<T> => ({ timedOut: false, value })),
      deadline
    ]);
  } finally {
    clearTimeout(timer);
  }
}

export type FanOutTask<T> = (item: T, index: number, abortSignal: AbortSignal) => Promise<string>;

/**
 * Run one task per item concurrently within `budgetMs`.
 *
 * The result has one answer per item, in item order. A task that throws
 * yields an error answer; a task still running when the budget runs out is
 * aborted and yields the timeout sentinel. A budget of zero or less starts
 * no tasks at all.
 */
export async function fanOut<T>(
  items: readonly T[],
  task: FanOutTask<T>,
  budgetMs: number
): Promise<string[]> {
  const answers: (string | undefined)[] = items.map(() => undefined);
  if (budgetMs <= 0 || items.length === 0) {
    return answers.map((answer) => answer ?? TIMEOUT_ANSWER);
  }

  const controller = new AbortController();
  let closed = false;

  const tasks = items.map(async (item, i) => {
    try {
      const answer = await task(item, i, controller.signal);
      if (!closed) answers[i] = answer;
    } catch (error) {
      if (!closed) answers[i] = unexpectedErrorAnswer(error);
    }
  });

  await withDeadline(Promise.all(tasks), budgetMs);
  closed = true;
  controller.abort();

  return answers.map((answer) => answer ?? TIMEOUT_ANSWER);
}
