import type { Attributes } from "./ir";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

/** Renders `attrs` as ` key="value"` pairs in key order; empty sets give "". */
export function attrsToString(attrs: Attributes): string {
  let out = "";
  for (const [k, v] of attrs) {
    out += ` ${k}="${escapeHtml(v)}"`;
  }
  return out;
}
