/**
 * Coerce a JSON object into the flat string map templates render from.
 * Numbers and booleans become strings, nested values their JSON text, and
 * null or undefined entries are dropped. Non-objects are returned untouched
 * so that `@IsObject()` can reject them.
 */
export function toStringPayload(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }

  const payload: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null || entry === undefined) continue;
    payload[key] =
      typeof entry === 'string'
        ? entry
        : typeof entry === 'object'
          ? JSON.stringify(entry)
          : String(entry);
  }
  return payload;
}
