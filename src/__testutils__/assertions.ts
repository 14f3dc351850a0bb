/**
 * assertions - Waiting helpers for tests that cross the event loop
 */

/**
 * Poll `fn` every 10ms until it returns true; throw after `timeoutMs`.
 *
 * @example
 * await assertEventually(() => child.hasExited, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}
