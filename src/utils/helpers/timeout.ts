import { TransientComputeError } from "@/utils/errors";

/**
 * Rejects with TransientComputeError when `task` does not settle within
 * `timeoutMs`. The task itself keeps running; only its result is dropped.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  if (!Number.isFinite(timeoutMs)) {
    return task;
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TransientComputeError(`${label} timed out after ${timeoutMs}ms`));
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([task, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export type Deadline = {
  remainingMs: () => number;
};

export function createDeadline(timeoutMs: number, now: () => number = Date.now): Deadline {
  const endsAt = now() + timeoutMs;
  return {
    remainingMs: () => Math.max(0, endsAt - now()),
  };
}
