/**
 * Derives an element id from heading text. Whitespace runs become "-", other
 * characters than letters, digits, "_" and "-" are dropped. When `used`
 * already holds the id, "-1", "-2", ... is appended until it is unique; the
 * returned id is not added to `used`.
 */
export function slugify(text: string, used: ReadonlySet<string> = new Set()): string {
  const base =
    text
      .trim()
      .replace(/[^\p{L}\p{N}\s_-]/gu, "")
      .replace(/\s+/g, "-") || "heading";
  if (!used.has(base)) return base;
  for (let n = 1; ; n++) {
    const candidate = `${base}-${n}`;
    if (!used.has(candidate)) return candidate;
  }
}
