import { createHash } from 'crypto';

type KeyPart = string | number | boolean | null | undefined;

/**
 * Deterministic cache key for a memoised call. `args` is hashed after its
 * keys are sorted, so `{ a, b }` and `{ b, a }` share an entry.
 */
export function cacheKey(prefix: string, namespace: string, args: Record<string, KeyPart>): string {
  const canonical = JSON.stringify(
    Object.keys(args)
      .sort()
      .map((name) => [name, args[name] ?? null]),
  );
  const digest = createHash('sha1').update(canonical).digest('hex');
  return `${prefix}:${namespace}:${digest}`;
}
