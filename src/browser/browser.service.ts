import { Inject, Injectable, Logger } from '@nestjs/common';
import { BROWSER_DRIVER_FACTORY, BrowserDriver, BrowserDriverFactory } from './browser-driver';

/**
 * Hands out one browser session per unit of work and always closes it.
 */
@Injectable()
export class BrowserService {
  private readonly logger = new Logger(BrowserService.name);

  constructor(@Inject(BROWSER_DRIVER_FACTORY) private readonly createDriver: BrowserDriverFactory) {}

  async withDriver<T>(work: (driver: BrowserDriver) => Promise<T>): Promise<T> {
    const driver = await this.createDriver();
    this.logger.debug('Browser session started');
    try {
      return await work(driver);
    } finally {
      try {
        await driver.quit();
        this.logger.debug('Browser session closed');
      } catch (error) {
        this.logger.warn(`Failed to close browser session: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
