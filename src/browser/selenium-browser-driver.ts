import * as path from 'path';
import { Browser, Builder, By, WebDriver, WebElement, error } from 'selenium-webdriver';
import { Options, ServiceBuilder } from 'selenium-webdriver/chrome';
import { BrowserDriver, BrowserElement, ElementNotFoundError, Locator } from './browser-driver';

export const CHROME_ARGUMENTS = ['--headless', '--no-sandbox', '--disable-dev-shm-usage'];

// 2 = block images
export const CHROME_PREFERENCES = { 'profile.managed_default_content_settings.images': 2 };

export interface LaunchOptions {
  /** Staged chromedriver binary; selenium looks one up on PATH when omitted. */
  driverPath?: string;
  /** Chrome executable. Bare command names are left to chromedriver's lookup. */
  chromeBinary?: string;
}

export function chromeOptions(chromeBinary?: string): Options {
  const options = new Options();
  options.addArguments(...CHROME_ARGUMENTS);
  options.setUserPreferences(CHROME_PREFERENCES);
  if (chromeBinary && chromeBinary.includes(path.sep)) {
    options.setChromeBinaryPath(path.resolve(chromeBinary));
  }
  return options;
}

function toBy(locator: Locator): By {
  switch (locator.by) {
    case 'css':
      return By.css(locator.value);
    case 'xpath':
      return By.xpath(locator.value);
    case 'tag':
      return By.tagName(locator.value);
  }
}

async function findOne(scope: WebDriver | WebElement, locator: Locator): Promise<BrowserElement> {
  try {
    return new SeleniumElement(await scope.findElement(toBy(locator)));
  } catch (err) {
    if (err instanceof error.NoSuchElementError) {
      throw new ElementNotFoundError(locator);
    }
    throw err;
  }
}

async function findMany(scope: WebDriver | WebElement, locator: Locator): Promise<BrowserElement[]> {
  const elements = await scope.findElements(toBy(locator));
  return elements.map((element) => new SeleniumElement(element));
}

class SeleniumElement implements BrowserElement {
  constructor(private readonly element: WebElement) {}

  clear(): Promise<void> {
    return this.element.clear();
  }

  sendKeys(text: string): Promise<void> {
    return this.element.sendKeys(text);
  }

  click(): Promise<void> {
    return this.element.click();
  }

  async getAttribute(name: string): Promise<string | null> {
    const value: string | null = await this.element.getAttribute(name);
    return value ?? null;
  }

  findElement(locator: Locator): Promise<BrowserElement> {
    return findOne(this.element, locator);
  }

  findElements(locator: Locator): Promise<BrowserElement[]> {
    return findMany(this.element, locator);
  }
}

/**
 * Headless Chrome session driven through chromedriver.
 */
export class SeleniumBrowserDriver implements BrowserDriver {
  private constructor(private readonly driver: WebDriver) {}

  static async launch({ driverPath, chromeBinary }: LaunchOptions = {}): Promise<SeleniumBrowserDriver> {
    let builder = new Builder().forBrowser(Browser.CHROME).setChromeOptions(chromeOptions(chromeBinary));
    if (driverPath) {
      builder = builder.setChromeService(new ServiceBuilder(driverPath));
    }
    return new SeleniumBrowserDriver(await builder.build());
  }

  get(url: string): Promise<void> {
    return this.driver.get(url);
  }

  currentUrl(): Promise<string> {
    return this.driver.getCurrentUrl();
  }

  findElement(locator: Locator): Promise<BrowserElement> {
    return findOne(this.driver, locator);
  }

  findElements(locator: Locator): Promise<BrowserElement[]> {
    return findMany(this.driver, locator);
  }

  executeScript(script: string): Promise<unknown> {
    return this.driver.executeScript<unknown>(script);
  }

  quit(): Promise<void> {
    return this.driver.quit();
  }
}
