export type LocatorStrategy = 'css' | 'xpath' | 'tag';

export interface Locator {
  by: LocatorStrategy;
  value: string;
}

export const css = (value: string): Locator => ({ by: 'css', value });
export const xpath = (value: string): Locator => ({ by: 'xpath', value });
export const tag = (value: string): Locator => ({ by: 'tag', value });

export function describeLocator(locator: Locator): string {
  return `${locator.by}=${locator.value}`;
}

/** Raised by `findElement` when nothing on the page matches. */
export class ElementNotFoundError extends Error {
  constructor(readonly locator: Locator) {
    super(`No element matches ${describeLocator(locator)}`);
    this.name = 'ElementNotFoundError';
  }
}

export interface ElementSearch {
  /** @throws ElementNotFoundError */
  findElement(locator: Locator): Promise<BrowserElement>;
  findElements(locator: Locator): Promise<BrowserElement[]>;
}

export interface BrowserElement extends ElementSearch {
  clear(): Promise<void>;
  sendKeys(text: string): Promise<void>;
  click(): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
}

/**
 * The slice of a WebDriver session the scraper needs. Kept narrow so tests
 * can drive the scraper against a scripted page.
 */
export interface BrowserDriver extends ElementSearch {
  get(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  /** Runs `script` in the page; the result is whatever the script returns. */
  executeScript(script: string): Promise<unknown>;
  quit(): Promise<void>;
}

export type BrowserDriverFactory = () => Promise<BrowserDriver>;

export const BROWSER_DRIVER_FACTORY = Symbol('BROWSER_DRIVER_FACTORY');
