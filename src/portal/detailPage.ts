import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { describeError } from "../engine/errors";
import { DetailPage, RawSection } from "../types/collaborators";
import { FieldMap } from "../types/records";
import { toFieldKey } from "../utils/text";
import { CategoryLayout, DetailSection } from "./categories";
import { parseFlag, resolveHref, textOf } from "./html";

type Scope = cheerio.Cheerio<AnyNode>;

const NO_RECORDS = ".k-no-data, .k-grid-norecords-template";
const ITEM_SELECTOR = "li, div.item, span.tag, div.chip, span.badge";

function isFlagCell(cell: Scope): boolean {
  return cell.find("span.k-icon, input[type='checkbox']").length > 0;
}

function readValue(valueCol: Scope, key: string, fields: FieldMap, baseUrl: string): void {
  const rating = valueCol.find("span.k-rating").first();
  if (rating.length > 0) {
    const value = rating.attr("aria-valuenow")?.trim();
    fields[key] = value && !textOf(valueCol).includes("Not Rated") ? value : "Not Rated";
    return;
  }

  if (isFlagCell(valueCol)) {
    fields[key] = parseFlag(valueCol);
    return;
  }

  const mail = valueCol.find("a[href^='mailto:']").first();
  const tel = valueCol.find("a[href^='tel:']").first();
  if (mail.length > 0 || tel.length > 0) {
    if (mail.length > 0) fields.Email = textOf(mail);
    if (tel.length > 0) fields.Phone = textOf(tel);
    return;
  }

  const link = valueCol.find("a[href]").first();
  if (link.length > 0) {
    fields[key] = textOf(link);
    fields[`${key}_URL`] = resolveHref(link.attr("href"), baseUrl);
    return;
  }

  fields[key] = textOf(valueCol);
}

function extractFields($: cheerio.CheerioAPI, panel: Scope, baseUrl: string): FieldMap {
  const fields: FieldMap = {};

  const crumbs = panel
    .find("ol.breadcrumb li")
    .toArray()
    .map((item) => textOf($(item)))
    .filter((text) => text.length > 0);
  if (crumbs.length > 0) fields.Academic_Unit = crumbs.join(" > ");

  panel.find("div.row").each((_, element) => {
    const row = $(element);
    const label = row.find("label").first();
    if (label.length === 0) return;

    const key = label.attr("for")?.trim() || toFieldKey(textOf(label));
    if (!key) return;

    const valueCol = row
      .find("div[class*='col-']")
      .filter((__, col) => $(col).find("label").length === 0)
      .first();
    if (valueCol.length === 0) return;
    readValue(valueCol, key, fields, baseUrl);
  });

  panel.find("table.table").each((_, element) => {
    const table = $(element);
    const headers = table.find("thead th").toArray().map((th) => toFieldKey(textOf($(th))));
    table.find("tbody td").each((index, td) => {
      const cell = $(td);
      const key = headers[index] || `Column_${index}`;
      fields[key] = isFlagCell(cell) ? parseFlag(cell) : textOf(cell);
    });
  });

  const image = panel.find("img[alt]").first();
  const src = resolveHref(image.attr("src"), baseUrl);
  if (src) fields.Photo_URL = src;

  return fields;
}

function findGrid(panel: Scope): Scope | null {
  const grid = panel.find("div.k-grid").first();
  if (grid.length > 0) return grid;
  const table = panel.find("tr.k-master-row").first().closest("table");
  return table.length > 0 ? table : null;
}

function extractGrid($: cheerio.CheerioAPI, grid: Scope, baseUrl: string): FieldMap[] {
  if (grid.find(NO_RECORDS).length > 0) return [];

  const headers = grid.find("thead th").toArray().map((th) => toFieldKey(textOf($(th))));
  const rows: FieldMap[] = [];

  grid.find("tr.k-master-row").each((_, element) => {
    const cells = $(element).children("td");
    if (cells.length === 0) return;

    const item: FieldMap = {};
    cells.each((index, td) => {
      const cell = $(td);
      const key = headers[index] || `Column_${index}`;
      const link = cell.find("a[href]").first();
      if (link.length > 0) {
        item[key] = textOf(link);
        item[`${key}_URL`] = resolveHref(link.attr("href"), baseUrl);
      } else if (isFlagCell(cell)) {
        item[key] = parseFlag(cell);
      } else {
        item[key] = textOf(cell);
      }
    });
    rows.push(item);
  });

  return rows;
}

function panelContent(panel: Scope): Scope {
  const content = panel.find(".k-content, .panel-body").first();
  return content.length > 0 ? content : panel;
}

function extractItems($: cheerio.CheerioAPI, panel: Scope): FieldMap[] {
  const content = panelContent(panel);
  const texts = content
    .find(ITEM_SELECTOR)
    .toArray()
    .map((item) => textOf($(item)))
    .filter((text) => text.length > 0);
  if (texts.length > 0) return texts.map((Value) => ({ Value }));

  const plain = content.is(panel) ? "" : textOf(content);
  return plain
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((Value) => ({ Value }));
}

export function extractSection(
  $: cheerio.CheerioAPI,
  panel: Scope,
  section: DetailSection,
  baseUrl: string
): RawSection {
  const grid = findGrid(panel);
  switch (section.shape) {
    case "fields":
      return extractFields($, panel, baseUrl);
    case "grid":
      if (!grid) throw new Error(`${section.name}: no grid in panel ${section.panel}`);
      return extractGrid($, grid, baseUrl);
    case "items":
      return grid ? extractGrid($, grid, baseUrl) : extractItems($, panel);
    case "auto":
      return grid ? extractGrid($, grid, baseUrl) : extractFields($, panel, baseUrl);
  }
}

/**
 * Extracts every section the layout names from a rendered detail page.
 * Sections are read independently: one failing leaves the others intact,
 * and a panel the page does not render is left out of the result.
 */
export function parseDetailPage(html: string, layout: CategoryLayout, baseUrl: string): DetailPage {
  const $ = cheerio.load(html);
  const panels = $("ul.k-panelbar").first().children("li");
  const page: DetailPage = {};

  for (const section of layout.sections) {
    const panel = panels.eq(section.panel - 1);
    if (panel.length === 0) continue;
    try {
      page[section.name] = { ok: true, payload: extractSection($, panel, section, baseUrl) };
    } catch (error) {
      page[section.name] = { ok: false, error: describeError(error).message };
    }
  }

  return page;
}
