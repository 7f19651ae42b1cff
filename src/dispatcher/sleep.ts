import { setTimeout as delay } from 'node:timers/promises';

/** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
export async function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
}
