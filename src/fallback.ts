export type AttemptFailureHandler<V> = (
  variant: V,
  error: unknown,
  attempt: number
) => void;

/**
 * Runs `task` with each variant in order and returns the first result that
 * does not throw. Rethrows the last error once every variant has failed.
 */
export async function firstSuccessful<V, R>(
  variants: readonly V[],
  task: (variant: V, attempt: number) => Promise<R>,
  onFailure?: AttemptFailureHandler<V>
): Promise<R> {
  if (variants.length === 0) {
    throw new Error("No variants to attempt");
  }

  let lastError: unknown;
  for (const [index, variant] of variants.entries()) {
    try {
      return await task(variant, index + 1);
    } catch (error: unknown) {
      lastError = error;
      onFailure?.(variant, error, index + 1);
    }
  }
  throw lastError;
}
