/** Let scheduled (setTimeout 0) frames run. */
export function flushTimers(): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, 5));
}
