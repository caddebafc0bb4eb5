import type { Predicate } from '../waiting/types.js';
import type { IBrowserDriver } from './browser-driver.js';

export function elementVisible(driver: IBrowserDriver, selector: string): Predicate {
  return () => driver.isVisible(selector);
}

export function elementHidden(driver: IBrowserDriver, selector: string): Predicate {
  return async () => !(await driver.isVisible(selector));
}

export function elementEnabled(driver: IBrowserDriver, selector: string): Predicate {
  return async () => (await driver.isVisible(selector)) && (await driver.isEnabled(selector));
}

export function textPresent(driver: IBrowserDriver, selector: string, expected: string): Predicate {
  return async () => {
    const text = await driver.textContent(selector);
    return text !== null && text.includes(expected);
  };
}

export function urlChanged(driver: IBrowserDriver, fromUrl: string): Predicate {
  return () => driver.currentUrl() !== fromUrl;
}

export function urlContains(driver: IBrowserDriver, fragment: string): Predicate {
  return () => driver.currentUrl().includes(fragment);
}
