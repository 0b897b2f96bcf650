/**
 * Oracle JSON recovery
 *
 * Models wrap JSON in code fences or put reasoning text around it. This
 * strips fences, tries the whole text, then the outermost `{...}` block.
 * It never throws: callers get `{ ok: false, raw }` and apply their
 * stage fallback.
 *
 * @module services/pipeline/json
 */

export type OracleJsonResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; raw: string };

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch (error) {
    console.error(
      `[OracleJson] JSON.parse failed: ${error instanceof Error ? error.message : String(error)}`
    );
    return undefined;
  }
}

export function parseOracleJson(text: string): OracleJsonResult {
  if (!text || text.trim().length === 0) {
    return { ok: false, raw: text };
  }

  const clean = text.replace(/```(?:json)?\n?|\n?```/g, '').trim();

  const whole = tryParse(clean);
  if (isJsonObject(whole)) {
    return { ok: true, value: whole };
  }

  const firstBrace = clean.indexOf('{');
  const lastBrace = clean.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    const inner = tryParse(clean.slice(firstBrace, lastBrace + 1));
    if (isJsonObject(inner)) {
      return { ok: true, value: inner };
    }
  }

  console.error(
    `[OracleJson] No JSON object in oracle output (length=${text.length}, firstBrace=${firstBrace}, lastBrace=${lastBrace})`
  );
  return { ok: false, raw: text };
}

/**
 * True when the object carries at least one of the keys that identify a
 * stage's output. An object with none of them is treated as unparseable.
 */
export function hasSignatureKeys(
  value: Record<string, unknown>,
  keys: readonly string[]
): boolean {
  return keys.some((key) => key in value);
}
