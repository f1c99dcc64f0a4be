import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrowserDriver, css, xpath } from '../browser/browser-driver';
import { findOptional, sleep } from '../browser/wait-for';
import { EnvironmentVariables } from '../config/env.validation';
import { INSTAGRAM_URL, SCRAPER_TIMINGS, SCROLL_SCRIPT, ScraperTimings, SELECTORS } from './instagram.constants';
import { UserNotFoundException } from './user-not-found.exception';

/**
 * Page-level steps of a scraping session: signing in, opening a profile,
 * paging the feed.
 */
@Injectable()
export class InstagramSessionService {
  private readonly logger = new Logger(InstagramSessionService.name);

  constructor(
    private readonly config: ConfigService<EnvironmentVariables, true>,
    @Inject(SCRAPER_TIMINGS) private readonly timings: ScraperTimings,
  ) {}

  profileUrl(username: string): string {
    return `${INSTAGRAM_URL}/${username}`;
  }

  /**
   * Signs in with the configured account and dismisses the follow-up
   * "Not Now" prompts. A page without the login form is taken as an
   * existing session.
   *
   * @returns whether the login form was submitted
   */
  async login(driver: BrowserDriver): Promise<boolean> {
    const username = this.config.get('INST_USERNAME', { infer: true });
    const password = this.config.get('INST_PASSWORD', { infer: true });
    if (!username || !password) {
      this.logger.debug('No Instagram credentials configured, browsing anonymously');
      return false;
    }

    await driver.get(INSTAGRAM_URL);

    const usernameField = await findOptional(driver, css(SELECTORS.usernameInput), this.timings.wait);
    const passwordField = await findOptional(driver, css(SELECTORS.passwordInput), this.timings.wait);
    if (!usernameField || !passwordField) {
      this.logger.debug('Login form not present, assuming an active session');
      return false;
    }

    await usernameField.clear();
    await passwordField.clear();
    await usernameField.sendKeys(username);
    await passwordField.sendKeys(password);

    const submit = await findOptional(driver, css(SELECTORS.submitButton), this.timings.wait);
    if (!submit) {
      this.logger.warn('Login form has no submit button');
      return false;
    }
    await submit.click();

    // "save login info", then "turn on notifications"
    for (let prompt = 0; prompt < 2; prompt++) {
      const notNow = await findOptional(driver, xpath(SELECTORS.notNowButton), this.timings.wait);
      if (notNow) {
        await notNow.click();
      }
    }

    this.logger.log(`Signed in as ${username}`);
    return true;
  }

  /**
   * @throws UserNotFoundException when the profile page has no posts tab
   */
  async validateUser(driver: BrowserDriver, username: string): Promise<void> {
    await this.login(driver);
    await driver.get(this.profileUrl(username));

    const postsTab = await findOptional(driver, xpath(SELECTORS.postsTab), this.timings.wait);
    if (!postsTab) {
      throw new UserNotFoundException(username);
    }
  }

  async openProfile(driver: BrowserDriver, username: string): Promise<void> {
    await this.validateUser(driver, username);
    if ((await driver.currentUrl()) !== this.profileUrl(username)) {
      await driver.get(this.profileUrl(username));
    }
  }

  /**
   * Scrolls to the bottom, waits for the feed, and scrolls again.
   *
   * @returns true once the page height stops growing
   */
  async scrollPage(driver: BrowserDriver): Promise<boolean> {
    const before = await this.scrollToBottom(driver);
    await sleep(this.timings.scrollPauseMs);
    const after = await this.scrollToBottom(driver);
    return before === after;
  }

  private async scrollToBottom(driver: BrowserDriver): Promise<number> {
    const height = await driver.executeScript(SCROLL_SCRIPT);
    if (typeof height !== 'number') {
      throw new Error(`Scroll script returned ${String(height)} instead of the page height`);
    }
    return height;
  }
}
