import type { Page } from 'playwright';

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/**
 * Browser automation capability the wait helpers poll against.
 */
export interface IBrowserDriver {
  isVisible(selector: string): Promise<boolean>;
  isEnabled(selector: string): Promise<boolean>;
  /** Text content of the first match, null when absent */
  textContent(selector: string): Promise<string | null>;
  currentUrl(): string;
  navigate(url: string): Promise<void>;
  waitForLoadState(state: LoadState, timeout: number): Promise<void>;
}

/**
 * {@link IBrowserDriver} backed by a Playwright page.
 * Element queries never wait on their own; polling is left to the caller.
 */
export class PlaywrightBrowserDriver implements IBrowserDriver {
  constructor(private page: Page) {}

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async isEnabled(selector: string): Promise<boolean> {
    const element = this.page.locator(selector).first();
    if ((await element.count()) === 0) {
      return false;
    }
    return element.isEnabled({ timeout: 0 });
  }

  async textContent(selector: string): Promise<string | null> {
    const element = this.page.locator(selector).first();
    if ((await element.count()) === 0) {
      return null;
    }
    return element.textContent({ timeout: 0 });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'load' });
  }

  async waitForLoadState(state: LoadState, timeout: number): Promise<void> {
    await this.page.waitForLoadState(state, { timeout });
  }
}
