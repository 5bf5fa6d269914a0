import { Page } from "playwright";
import { describeError } from "../engine/errors";
import { Session } from "../types/collaborators";
import { log } from "../utils/log";
import { confirm, Prompt } from "../utils/prompt";

const LOGIN_FORM = "input[type='password']";

/**
 * The operator logs in by hand in the opened browser; the harvest starts once
 * they confirm at the terminal. Expiry is only detected, never repaired.
 */
export class PortalSession implements Session {
  constructor(
    private readonly page: Page,
    private readonly loginUrl: string
  ) {}

  async establish(prompt: Prompt): Promise<boolean> {
    log.info(`Opening ${this.loginUrl}`);
    await this.page.goto(this.loginUrl, { waitUntil: "domcontentloaded" });
    log.info("Log in to the portal in the browser window.");

    const ready = await confirm(prompt, "Logged in and ready to start?");
    if (!ready) return false;
    const valid = await this.isValid();
    if (!valid) log.error("The browser still shows the login form.");
    return valid;
  }

  async isValid(): Promise<boolean> {
    if (this.page.isClosed()) return false;
    try {
      return (await this.page.locator(LOGIN_FORM).count()) === 0;
    } catch (error) {
      log.warn(`Session check failed: ${describeError(error).message}`);
      return false;
    }
  }
}
