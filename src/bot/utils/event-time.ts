const MS_THRESHOLD = 1_000_000_000_000;
const TZ_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalize a feed timestamp to epoch ms.
 *
 * Accepts epoch seconds or ms (numbers or digit strings; values above 1e12 are ms)
 * and ISO-8601 strings. ISO strings without an offset are read as UTC.
 */
export function parseEventTimeMs(raw: unknown): number | undefined {
  if (raw === null || raw === undefined) return undefined;

  if (typeof raw === "number") {
    if (!Number.isFinite(raw) || raw <= 0) return undefined;
    return raw > MS_THRESHOLD ? Math.floor(raw) : Math.floor(raw * 1000);
  }

  if (typeof raw !== "string") return undefined;
  const text = raw.trim();
  if (!text) return undefined;

  if (/^\d+$/.test(text)) {
    const value = Number(text);
    if (value <= 0) return undefined;
    return value > MS_THRESHOLD ? value : value * 1000;
  }

  let iso = text.replace(" ", "T");
  if (iso.includes("T") && !TZ_SUFFIX.test(iso)) {
    iso = `${iso}Z`;
  }
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? undefined : parsed;
}
