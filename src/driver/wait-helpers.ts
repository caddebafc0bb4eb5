import type { ILogger } from '../infra/logger.js';
import { describeError } from '../infra/logger.js';
import { ConditionWaiter } from '../waiting/condition-waiter.js';
import type { Predicate, WaitOptions } from '../waiting/types.js';
import type { IBrowserDriver, LoadState } from './browser-driver.js';
import {
  elementEnabled,
  elementHidden,
  elementVisible,
  textPresent,
  urlChanged
} from './conditions.js';

export type ElementState = 'visible' | 'hidden' | 'enabled';

/** Short budget for presence checks that are expected to answer quickly */
const VISIBILITY_CHECK_TIMEOUT = 5000;

/**
 * Boolean waits over a browser driver. Every wait answers true/false; none throws
 * on timeout.
 */
export class WaitHelpers {
  private waiter: ConditionWaiter;

  constructor(
    private driver: IBrowserDriver,
    private defaults: WaitOptions,
    private logger?: ILogger,
    waiter?: ConditionWaiter
  ) {
    this.waiter = waiter ?? new ConditionWaiter(logger);
  }

  async waitForCondition(predicate: Predicate, options: Partial<WaitOptions> = {}): Promise<boolean> {
    const outcome = await this.waiter.waitUntil(predicate, { ...this.defaults, ...options });
    return outcome.status === 'satisfied';
  }

  async waitForElement(
    selector: string,
    state: ElementState = 'visible',
    options: Partial<WaitOptions> = {}
  ): Promise<boolean> {
    const predicates: Record<ElementState, Predicate> = {
      visible: elementVisible(this.driver, selector),
      hidden: elementHidden(this.driver, selector),
      enabled: elementEnabled(this.driver, selector),
    };
    return this.waitForCondition(predicates[state], {
      description: `${selector} to be ${state}`,
      ...options,
    });
  }

  async waitForText(selector: string, expected: string, options: Partial<WaitOptions> = {}): Promise<boolean> {
    return this.waitForCondition(textPresent(this.driver, selector, expected), {
      description: `"${expected}" in ${selector}`,
      ...options,
    });
  }

  async waitForUrlChange(fromUrl: string, options: Partial<WaitOptions> = {}): Promise<boolean> {
    const changed = await this.waitForCondition(urlChanged(this.driver, fromUrl), {
      description: `URL to change from ${fromUrl}`,
      ...options,
    });
    if (changed) {
      this.logger?.debug(`URL changed from: ${fromUrl}`, { url: this.driver.currentUrl() });
    }
    return changed;
  }

  async isElementVisible(selector: string, timeout: number = VISIBILITY_CHECK_TIMEOUT): Promise<boolean> {
    return this.waitForElement(selector, 'visible', {
      timeout,
      pollInterval: Math.min(this.defaults.pollInterval, timeout),
    });
  }

  /**
   * Waits on the driver's own load-state signal. A driver timeout is reported as false.
   */
  async waitForPageLoad(state: LoadState = 'networkidle', timeout: number = this.defaults.timeout): Promise<boolean> {
    try {
      await this.driver.waitForLoadState(state, timeout);
      this.logger?.debug(`Page reached ${state}`);
      return true;
    } catch (error) {
      this.logger?.warn(`Page did not reach ${state} state`, { error: describeError(error) });
      return false;
    }
  }
}
