import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { normalizeWhitespace } from "../utils/text";

const CHECKED_ICONS = new Set(["k-i-checkbox-checked", "k-i-check"]);
const UNCHECKED_ICONS = new Set(["k-i-checkbox", "k-i-close", "k-i-x"]);
const YES_TEXT = new Set(["yes", "true", "1", "✓", "✔"]);
const NO_TEXT = new Set(["no", "false", "0", "✗", "✘", ""]);

export function textOf(element: cheerio.Cheerio<AnyNode>): string {
  return normalizeWhitespace(element.text());
}

/** Absolute URL for an href, or the href unchanged when it cannot be resolved. */
export function resolveHref(href: string | undefined, baseUrl: string): string {
  const trimmed = href?.trim() ?? "";
  if (!trimmed) return "";
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return trimmed;
  }
}

function flagFromText(text: string): string {
  const lower = text.toLowerCase();
  if (YES_TEXT.has(lower)) return "Yes";
  if (NO_TEXT.has(lower)) return "No";
  return text;
}

/**
 * Reads a Yes/No cell: an icon's title, then its class, then a checkbox
 * input, then the cell text.
 */
export function parseFlag(element: cheerio.Cheerio<AnyNode>): string {
  const icon = element.is("span.k-icon") ? element : element.find("span.k-icon").first();
  if (icon.length > 0) {
    const title = icon.attr("title")?.trim();
    if (title) return title;
    const classes = (icon.attr("class") ?? "").split(/\s+/);
    if (classes.some((name) => CHECKED_ICONS.has(name))) return "Yes";
    if (classes.some((name) => UNCHECKED_ICONS.has(name))) return "No";
  }

  const checkbox = element.find("input[type='checkbox']").first();
  if (checkbox.length > 0) {
    return checkbox.attr("checked") !== undefined ? "Yes" : "No";
  }

  return flagFromText(textOf(element));
}
