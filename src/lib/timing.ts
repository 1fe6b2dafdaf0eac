import { setTimeout as delay } from 'node:timers/promises';

const SLICE_MS = 100;

/**
 * Sleeps for `ms` in slices of at most 100ms and returns early (with `false`)
 * as soon as `keepGoing` turns false.
 */
export async function sleepWhile(ms: number, keepGoing: () => boolean): Promise<boolean> {
  let remaining = ms;
  while (remaining > 0) {
    if (!keepGoing()) return false;
    const slice = Math.min(SLICE_MS, remaining);
    await delay(slice);
    remaining -= slice;
  }
  return keepGoing();
}

/** Resolves to true if `promise` settles within `ms`, false otherwise. */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true as const, () => true as const), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
