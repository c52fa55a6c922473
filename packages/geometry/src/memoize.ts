import type { Mat4, TransformFunction } from "./types.js";

export interface MemoizedTransform<P extends readonly number[]> {
  (...params: P): Mat4;
  /** Number of distinct argument lists seen so far */
  size(): number;
  clear(): void;
}

function keyOf(params: readonly number[]): string {
  return params.map((p) => (Object.is(p, -0) ? "-0" : String(p))).join(",");
}

/**
 * Cache a pure transform function by its numeric arguments. Repeated calls
 * with the same arguments return the same matrix instance.
 */
export function memoizeTransform<P extends readonly number[]>(
  fn: TransformFunction<P>
): MemoizedTransform<P> {
  const cache = new Map<string, Mat4>();

  const memoized = (...params: P): Mat4 => {
    const key = keyOf(params);
    const hit = cache.get(key);
    if (hit !== undefined) return hit;
    const result = fn(...params);
    cache.set(key, result);
    return result;
  };

  return Object.assign(memoized, {
    size: () => cache.size,
    clear: () => cache.clear(),
  });
}
