/**
 * Epoch arithmetic and the interruptible countdown.
 * An epoch is 2160 blocks at ~10s per block (~6h).
 */

import type { StateStore } from "./state.ts";

export const EPOCH_BLOCKS = 2160;
export const BLOCK_SECONDS = 10;
export const MIN_EPOCH_SLEEP_SECONDS = 300;

/** Blocks left until the next epoch boundary minus the buffer. May be <= 0. */
export function blocksUntilNextEpoch(height: number, bufferBlocks: number): number {
  const intoEpoch = ((height % EPOCH_BLOCKS) + EPOCH_BLOCKS) % EPOCH_BLOCKS;
  return EPOCH_BLOCKS - intoEpoch - bufferBlocks;
}

/** Seconds to sleep before the next decision cycle; never less than 300. */
export function epochSleepSeconds(height: number, bufferBlocks: number): number {
  const blocks = blocksUntilNextEpoch(height, bufferBlocks);
  if (blocks <= 0) return MIN_EPOCH_SLEEP_SECONDS;
  return blocks * BLOCK_SECONDS;
}

/** Whole minutes until the buffered boundary. Reporting only. */
export function minutesUntilNextEpoch(height: number, bufferBlocks: number): number {
  const seconds = Math.max(blocksUntilNextEpoch(height, bufferBlocks) * BLOCK_SECONDS, 0);
  return Math.floor(seconds / 60);
}

/** Resolves after `ms`, or early (with false) once the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function completionLabel(seconds: number): string {
  const done = new Date(Date.now() + seconds * 1000);
  const hh = String(done.getHours()).padStart(2, "0");
  const mm = String(done.getMinutes()).padStart(2, "0");
  return `@ ${hh}:${mm}`;
}

/**
 * Count down `seconds` in steps of at most one second, publishing the remaining
 * time so display consumers see it tick. Only the shutdown signal cuts it short.
 * Returns false if cancelled.
 */
export async function sleepWithFeedback(
  store: StateStore,
  seconds: number,
  signal?: AbortSignal,
): Promise<boolean> {
  let remaining = Math.max(0, Math.floor(seconds));
  store.update((s) => {
    s.remainingSeconds = remaining;
    s.completionTimeLabel = completionLabel(remaining);
  });

  while (remaining > 0) {
    const step = Math.min(1, remaining);
    const completed = await sleep(step * 1000, signal);
    if (!completed) return false;
    remaining -= step;
    store.update((s) => {
      s.remainingSeconds = remaining;
    });
  }
  return true;
}

export function sleepUntilNextEpoch(
  store: StateStore,
  height: number,
  bufferBlocks: number,
  signal?: AbortSignal,
): Promise<boolean> {
  return sleepWithFeedback(store, epochSleepSeconds(height, bufferBlocks), signal);
}
