/**
 * Runs `build`; if it throws, runs `dispose` and rethrows the original error.
 * An error from `dispose` itself is logged, not raised over the first one.
 */
export function disposeOnThrow<T>(build: () => T, dispose: () => void): T {
  try {
    return build();
  } catch (e) {
    try {
      dispose();
    } catch (cleanupError) {
      console.warn("[dispose] cleanup failed", cleanupError);
    }
    throw e;
  }
}
