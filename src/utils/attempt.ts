/**
 * Best-effort execution: failures collapse into a value instead of a throw
 */

export type Attempt<T> = { ok: true; value: T } | { ok: false; error: unknown };

export async function attempt<T>(fn: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
