import { chromium, Browser, BrowserContext, Page } from "playwright";
import { describeError } from "../engine/errors";
import { log } from "../utils/log";

export const DEFAULT_VIEWPORT = { width: 1280, height: 720 };
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const DEFAULT_ACCEPT_LANGUAGE = "en-US,en;q=0.9";

export interface BrowserOptions {
  headless: boolean;
  navigationTimeoutMs: number;
}

export interface PortalBrowser {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close(): Promise<void>;
}

export async function launchChromium(headless: boolean): Promise<Browser> {
  return chromium.launch({
    headless,
    args: ["--disable-blink-features=AutomationControlled"]
  });
}

export async function newContext(
  browser: Browser,
  viewport = DEFAULT_VIEWPORT
): Promise<BrowserContext> {
  return browser.newContext({
    viewport,
    userAgent: DEFAULT_USER_AGENT,
    locale: "en-US",
    extraHTTPHeaders: {
      "Accept-Language": DEFAULT_ACCEPT_LANGUAGE
    }
  });
}

/** One browser, one context, one page: the portal session is never shared. */
export async function openPortalBrowser(options: BrowserOptions): Promise<PortalBrowser> {
  const browser = await launchChromium(options.headless);
  const context = await newContext(browser);
  context.setDefaultNavigationTimeout(options.navigationTimeoutMs);
  context.setDefaultTimeout(options.navigationTimeoutMs);
  const page = await context.newPage();

  return {
    browser,
    context,
    page,
    close: async () => {
      await context.close().catch((error: unknown) => {
        log.debug(`Closing the browser context failed: ${describeError(error).message}`);
      });
      await browser.close();
    }
  };
}
