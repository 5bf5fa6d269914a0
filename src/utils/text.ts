export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** "Web Presence" -> "Web_Presence", "Price & Availability" -> "Price_Availability". */
export function toFieldKey(label: string): string {
  return normalizeWhitespace(label)
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}
