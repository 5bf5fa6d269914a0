import { errors, Page } from "playwright";
import {
  describeError,
  PortalHarvestError,
  SessionExpiredError,
  TransientError
} from "../engine/errors";
import { DetailPage, ListPage, PageFetcher, PartitionRef } from "../types/collaborators";
import { log } from "../utils/log";
import { CategoryLayout } from "./categories";
import { parseDetailPage } from "./detailPage";
import { parseInstitutionOptions, parseListPage } from "./listPage";

const DROPDOWN_TRIGGER = "span[aria-controls='HeiId_listbox']";
const DROPDOWN_LIST = "#HeiId_listbox";
const NEXT_PAGE = "a.k-pager-nav[aria-label='Go to the next page']";
const LOADING_MASK = ".k-loading-mask";
const PANEL_BAR = "ul.k-panelbar";
const COLLAPSED_PANEL = "li.k-panelbar-header[aria-expanded='false'] > .k-link";
const LOGIN_FORM = "input[type='password']";

export const GLOBAL_PARTITION: PartitionRef = { label: "All organizations", global: true };

const THROTTLE_PATTERNS = ["too many requests", "rate limit exceeded", "please slow down"];

/** Returns the matched phrase when the portal answered with a throttling page. */
export function detectThrottling(content: string): string | null {
  const lower = content.toLowerCase();
  return THROTTLE_PATTERNS.find((pattern) => lower.includes(pattern)) ?? null;
}

export interface PortalFetcherOptions {
  page: Page;
  layout: CategoryLayout;
  /** Paginated list page; null for a details-only fetcher. */
  listUrl: string | null;
  partitioned: boolean;
  loadingTimeoutMs: number;
}

interface ListPosition {
  partition: string;
  pageIndex: number;
}

/**
 * Drives the portal's Kendo UI list and detail pages in one browser tab.
 * The list grid is stateful, so the fetcher remembers where it stands and
 * re-navigates from the start of a partition whenever it loses track.
 */
export class PortalFetcher implements PageFetcher {
  private position: ListPosition | null = null;

  constructor(private readonly options: PortalFetcherOptions) {}

  async listPartitions(): Promise<PartitionRef[]> {
    if (!this.options.partitioned) return [GLOBAL_PARTITION];

    return this.guard("institution list", async () => {
      const { page } = this.options;
      await this.openList();
      await page.locator(DROPDOWN_TRIGGER).click();
      await page.locator(DROPDOWN_LIST).waitFor({ state: "visible" });
      const names = parseInstitutionOptions(await page.content());
      await page.keyboard.press("Escape");
      log.info(`Found ${names.length} institutions`);
      return names.map((label) => ({ label, global: false }));
    });
  }

  async fetchListPage(partition: PartitionRef, pageIndex: number): Promise<ListPage> {
    return this.guard(`${partition.label} page ${pageIndex + 1}`, async () => {
      await this.moveTo(partition, pageIndex);
      const html = await this.readPage();
      const parsed = parseListPage(html, this.options.layout, this.options.page.url());
      if (parsed.pager) {
        log.debug(`${partition.label}: items ${parsed.pager.start}-${parsed.pager.end} of ${parsed.pager.total}`);
      }
      const rows = partition.global
        ? parsed.rows
        : parsed.rows.map((row) => ({ Institution: partition.label, ...row }));
      return { rows, hasNextPage: parsed.hasNextPage };
    });
  }

  async fetchDetailPage(url: string): Promise<DetailPage> {
    return this.guard(url, async () => {
      const { page } = this.options;
      this.position = null;
      await page.goto(url, { waitUntil: "domcontentloaded" });
      await this.assertLoggedIn();
      await page.locator(PANEL_BAR).first().waitFor({ state: "attached" });
      await this.expandPanels();
      return parseDetailPage(await this.readPage(), this.options.layout, page.url());
    });
  }

  private async moveTo(partition: PartitionRef, pageIndex: number): Promise<void> {
    const here = this.position;
    if (here && here.partition === partition.label && here.pageIndex === pageIndex) return;
    if (here && here.partition === partition.label && here.pageIndex + 1 === pageIndex) {
      await this.clickNext();
      this.position = { partition: partition.label, pageIndex };
      return;
    }

    await this.openList();
    if (!partition.global) await this.selectInstitution(partition.label);
    for (let index = 0; index < pageIndex; index++) {
      await this.clickNext();
    }
    this.position = { partition: partition.label, pageIndex };
  }

  private async openList(): Promise<void> {
    const { page, listUrl } = this.options;
    if (!listUrl) throw new PortalHarvestError("This phase has no list page");
    this.position = null;
    await page.goto(listUrl, { waitUntil: "domcontentloaded" });
    await this.assertLoggedIn();
    await this.waitForGrid();
  }

  private async selectInstitution(label: string): Promise<void> {
    const { page } = this.options;
    await page.locator(DROPDOWN_TRIGGER).click();
    await page.locator(DROPDOWN_LIST).waitFor({ state: "visible" });
    const option = page.locator(`${DROPDOWN_LIST} li`).filter({ hasText: label }).first();
    if ((await option.count()) === 0) {
      await page.keyboard.press("Escape");
      throw new TransientError("render-failure", `Institution "${label}" is not in the dropdown`);
    }
    await option.click();
    await this.waitForGrid();
  }

  private async clickNext(): Promise<void> {
    const next = this.options.page.locator(NEXT_PAGE).first();
    if ((await next.getAttribute("aria-disabled")) === "true") {
      throw new TransientError("render-failure", "Next page button is disabled");
    }
    await next.click();
    await this.waitForGrid();
  }

  private async waitForGrid(): Promise<void> {
    const mask = this.options.page.locator(LOADING_MASK).first();
    await mask
      .waitFor({ state: "hidden", timeout: this.options.loadingTimeoutMs })
      .catch((error: unknown) => {
        log.debug(`Loading mask still visible, reading anyway (${describeError(error).message})`);
      });
  }

  private async expandPanels(): Promise<void> {
    const collapsed = this.options.page.locator(COLLAPSED_PANEL);
    const count = await collapsed.count();
    // Expanded headers drop out of the locator, so always take the first.
    for (let index = 0; index < count; index++) {
      const header = collapsed.first();
      if ((await header.count()) === 0) break;
      await header.click();
    }
  }

  private async assertLoggedIn(): Promise<void> {
    if ((await this.options.page.locator(LOGIN_FORM).count()) > 0) {
      throw new SessionExpiredError();
    }
  }

  private async readPage(): Promise<string> {
    const html = await this.options.page.content();
    const throttled = detectThrottling(html);
    if (throttled) {
      throw new TransientError("rate-limited", `Portal is throttling requests ("${throttled}")`);
    }
    return html;
  }

  private async guard<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.position = null;
      throw this.classify(label, error);
    }
  }

  private classify(label: string, error: unknown): Error {
    if (error instanceof PortalHarvestError) return error;
    if (this.options.page.isClosed()) {
      return new SessionExpiredError("The browser page was closed; log in again and resume the phase");
    }
    const message = `${label}: ${describeError(error).message}`;
    if (error instanceof errors.TimeoutError) {
      return new TransientError("timeout", message, { cause: error });
    }
    return new TransientError("render-failure", message, { cause: error });
  }
}
