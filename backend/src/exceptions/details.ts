/**
 * Converts a lower-level failure (or any value) into the string stored as
 * `details`. The original value is not retained.
 */
export function normalizeDetails(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return String(value);
  } catch {
    return `[unprintable ${kindOf(value)}]`;
  }
}

// constructor name when readable; revoked proxies throw on any property read
function kindOf(value: unknown): string {
  if (typeof value !== 'object' || value === null) return typeof value;
  try {
    return value.constructor?.name || 'object';
  } catch {
    return 'object';
  }
}

export function truncateDetails(details: string, max: number): string {
  if (max <= 0 || details.length <= max) return details;
  let end = max;
  const last = details.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1; // keep surrogate pairs whole
  return `${details.slice(0, end)}…`;
}
