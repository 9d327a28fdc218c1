import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys: DEBUG -> 'debug'
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 *
 * @example
 * ```ts
 * const mode = createEnum(['full', 'refresh-only'] as const);
 *
 * // mode.object.FULL === 'full'
 * // mode.object['REFRESH-ONLY'] === 'refresh-only'
 * // typeof mode.type === 'full' | 'refresh-only'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [v.toUpperCase(), v])) as {
    [K in T[number] as Uppercase<K>]: K;
  };

  return {
    values,
    object: obj,
    schema: z.enum(values),
    type: null as unknown as T[number],
  };
}
