import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { FieldMap } from "../types/records";
import { CategoryLayout, ListLink } from "./categories";
import { parseFlag, resolveHref, textOf } from "./html";

const PAGER_INFO = /(\d+)\s*-\s*(\d+)\s+of\s+(\d+)\s+items?/i;
const NEXT_PAGE = "a.k-pager-nav[aria-label='Go to the next page']";

export interface PagerInfo {
  start: number;
  end: number;
  total: number;
}

export interface ParsedListPage {
  rows: FieldMap[];
  hasNextPage: boolean;
  pager: PagerInfo | null;
}

/** "1 - 100 of 163 items" -> { start: 1, end: 100, total: 163 }. */
export function parsePagerInfo(text: string): PagerInfo | null {
  const match = PAGER_INFO.exec(text);
  if (match) {
    return { start: Number(match[1]), end: Number(match[2]), total: Number(match[3]) };
  }
  if (/\bno items\b|^\s*0 items?\b/i.test(text)) {
    return { start: 0, end: 0, total: 0 };
  }
  return null;
}

function findLink(
  row: cheerio.Cheerio<AnyNode>,
  cells: cheerio.Cheerio<AnyNode>,
  link: ListLink,
  baseUrl: string
): string {
  const scope = link.cell === null ? row : cells.eq(link.cell);
  for (const selector of link.selectors) {
    const anchor = scope.find(selector).first();
    const href = resolveHref(anchor.attr("href"), baseUrl);
    if (href) return href;
  }
  // The link may sit outside the expected cell when columns are reordered.
  if (link.cell !== null) {
    for (const selector of link.selectors.slice(1)) {
      const href = resolveHref(row.find(selector).first().attr("href"), baseUrl);
      if (href) return href;
    }
  }
  return "Not Found";
}

export function parseListRows(
  $: cheerio.CheerioAPI,
  layout: CategoryLayout,
  baseUrl: string
): FieldMap[] {
  const rows: FieldMap[] = [];
  $("tr.k-master-row").each((_, element) => {
    const row = $(element);
    const cells = row.children("td");
    if (cells.length < layout.minCells) return;

    const fields: FieldMap = {};
    for (const column of layout.columns) {
      const cell = cells.eq(column.cell);
      fields[column.field] = column.kind === "flag" ? parseFlag(cell) : textOf(cell);
    }
    for (const link of layout.links) {
      fields[link.field] = findLink(row, cells, link, baseUrl);
    }
    rows.push(fields);
  });
  return rows;
}

export function hasNextPage($: cheerio.CheerioAPI, pager: PagerInfo | null): boolean {
  if (pager && pager.end >= pager.total) return false;
  const next = $(NEXT_PAGE).first();
  if (next.length === 0) return false;
  return next.attr("aria-disabled") !== "true" && !next.hasClass("k-disabled");
}

export function parseListPage(html: string, layout: CategoryLayout, baseUrl: string): ParsedListPage {
  const $ = cheerio.load(html);
  const pagerText = textOf($("span.k-pager-info").first());
  const pager = pagerText ? parsePagerInfo(pagerText) : null;
  return {
    rows: parseListRows($, layout, baseUrl),
    hasNextPage: hasNextPage($, pager),
    pager
  };
}

/** Institution names from the HEI dropdown, without the placeholder. */
export function parseInstitutionOptions(html: string): string[] {
  const $ = cheerio.load(html);
  return $("#HeiId_listbox li")
    .toArray()
    .map((item) => textOf($(item)))
    .filter((name) => name.length > 0 && !name.includes("Select HEI"));
}
