/**
 * Tolerant zod building blocks for oracle output.
 *
 * Oracle JSON is untrusted: fields go missing, enums drift, items arrive as
 * bare strings. These helpers coerce what can be coerced and substitute a
 * neutral default for the rest, so a single bad field never discards a whole
 * stage result.
 */

import { z } from 'zod';

/** String, defaulting to '' for anything else */
export const text = () => z.string().trim().catch('');

/** String or null; blank strings become null */
export const optionalText = () =>
  z
    .string()
    .nullable()
    .catch(null)
    .transform((v) => (v === null || v.trim() === '' ? null : v.trim()));

export const flag = () => z.boolean().catch(false);

const FALSE_WORDS = new Set(['', 'false', 'no', '0', 'n']);

/**
 * Victim flag. Fails toward protection: anything that is not clearly a "no"
 * (true, "yes", "true", "possibly", a non-zero number) reads as true.
 */
export const victimFlag = () =>
  z.unknown().transform((value): boolean => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
    if (typeof value === 'string') return !FALSE_WORDS.has(value.trim().toLowerCase());
    return false;
  });

/** Enum member (case-insensitive), or the given fallback for anything else */
export function oneOf<T extends string>(values: readonly [T, ...T[]], fallback: T) {
  return z.unknown().transform((value): T => {
    if (typeof value !== 'string') return fallback;
    const normalized = value.trim().toLowerCase();
    return values.find((candidate) => candidate === normalized) ?? fallback;
  });
}

/** Integer clamped to [min, max]; non-numbers become the fallback */
export function boundedInt(min: number, max: number, fallback: number) {
  return z
    .number()
    .catch(fallback)
    .transform((n) => Math.min(max, Math.max(min, Math.round(n))));
}

/** List of strings; non-string entries are dropped */
export const textList = () =>
  z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item) => (typeof item === 'string' && item.trim() !== '' ? [item.trim()] : []))
    );

/**
 * Names flagged as possible victims. Entries may be bare strings or objects
 * carrying a `name`; nothing name-like is dropped.
 */
export const victimNameList = () =>
  z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item): string[] => {
        const name =
          typeof item === 'string'
            ? item
            : typeof item === 'object' && item !== null && 'name' in item && typeof item.name === 'string'
              ? item.name
              : '';
        return name.trim() !== '' ? [name.trim()] : [];
      })
    );

/**
 * Array whose items are validated one by one. Items that fail are dropped
 * instead of failing the array.
 */
export function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((entry): Array<z.output<T>> => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}
