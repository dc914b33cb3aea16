/**
 * Browser-backed timezone probe
 *
 * Opens a public "what does the web see about you" page in headless Chromium and reads
 * the timezone cell. Tied to the page's DOM: a layout change makes this throw, which the
 * resolver logs and treats as "no result".
 */

import { chromium } from "playwright-core";
import { logger } from "@/lib/logger";
import type { BrowserFallbackConfig } from "@/types/app-config";
import type { BrowserTimezoneProbe } from "@/types/timezone";

export const TIMEZONE_XPATH =
  "/html/body/div[1]/div[2]/div/div/div/div[2]/div[2]/div[1]/div[4]/dl[1]/dd";

const LAUNCH_ARGS = ["--disable-gpu", "--no-sandbox", "--disable-dev-shm-usage"];

export class PrivacyPageProbe implements BrowserTimezoneProbe {
  constructor(
    private readonly config: Pick<BrowserFallbackConfig, "pageUrl" | "executablePath">,
    private readonly timeoutMs: number = 30_000
  ) {}

  async readTimezone(): Promise<string> {
    logger.debug("[PrivacyPageProbe] Launching headless browser", {
      pageUrl: this.config.pageUrl,
      executablePath: this.config.executablePath ?? null,
    });

    const browser = await chromium.launch({
      headless: true,
      args: LAUNCH_ARGS,
      timeout: this.timeoutMs,
      ...(this.config.executablePath
        ? { executablePath: this.config.executablePath }
        : { channel: "chrome" }),
    });

    try {
      const page = await browser.newPage();
      await page.goto(this.config.pageUrl, {
        waitUntil: "domcontentloaded",
        timeout: this.timeoutMs,
      });
      const text = await page
        .locator(`xpath=${TIMEZONE_XPATH}`)
        .innerText({ timeout: this.timeoutMs });
      return text.trim();
    } finally {
      await browser.close();
    }
  }
}
