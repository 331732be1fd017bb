export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

// Never rejects: a thrown error (sync or async) comes back as { ok: false }.
export async function settle<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}
