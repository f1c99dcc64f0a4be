import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrowserDriver, css, ElementNotFoundError, tag } from '../browser/browser-driver';
import { findAll, findOptional } from '../browser/wait-for';
import { EnvironmentVariables } from '../config/env.validation';
import { CacheStore } from '../redis/cache-store';
import { cacheKey } from '../redis/cache-key';
import {
  INSTAGRAM_URL,
  MEDIA_SELECTORS,
  MediaElementType,
  MediaType,
  POST_PATH_MARKER,
  POST_TYPE_LABELS,
  SCRAPER_TIMINGS,
  ScraperTimings,
} from './instagram.constants';
import { InstagramSessionService } from './instagram-session.service';

/**
 * Walks a profile feed with an open browser session. Per-post lookups are
 * memoised in the shared cache, keyed without the session.
 */
@Injectable()
export class InstagramScraperService {
  private readonly logger = new Logger(InstagramScraperService.name);

  constructor(
    private readonly session: InstagramSessionService,
    private readonly cache: CacheStore,
    private readonly config: ConfigService<EnvironmentVariables, true>,
    @Inject(SCRAPER_TIMINGS) private readonly timings: ScraperTimings,
  ) {}

  private key(namespace: string, args: Record<string, string | number | undefined>): string {
    return cacheKey(this.config.get('CACHE_PREFIX', { infer: true }), namespace, args);
  }

  private get ttl(): number {
    return this.config.get('CACHE_TTL_SECONDS', { infer: true });
  }

  /**
   * Opens the post and returns the `src` of every element of `type`.
   */
  getPostMedia(driver: BrowserDriver, postUrl: string, type: MediaElementType): Promise<string[]> {
    return this.cache.getOrSet(
      this.key('post-media', { postUrl, type }),
      async () => {
        await driver.get(postUrl);
        const elements = await findAll(driver, css(MEDIA_SELECTORS[type]), this.timings.wait);
        const sources: string[] = [];
        for (const element of elements) {
          const src = await element.getAttribute('src');
          if (src) {
            sources.push(src);
          }
        }
        return sources;
      },
      this.ttl,
    );
  }

  /**
   * Reads the type icon on the post's thumbnail in the current page. A
   * carousel matches when it holds at least one item of `type`, which needs
   * a visit to the post and a return to the feed.
   */
  isPostOfType(driver: BrowserDriver, postUrl: string, type: MediaType): Promise<boolean> {
    return this.cache.getOrSet(
      this.key('post-type', { postUrl, type }),
      async () => {
        const postType = await this.detectPostType(driver, postUrl);

        if (postType === MediaType.Carousel) {
          if (type === MediaType.Carousel) {
            return true;
          }
          const feedUrl = await driver.currentUrl();
          const media = await this.getPostMedia(driver, postUrl, type);
          await driver.get(feedUrl);
          return media.length > 0;
        }

        return postType === type;
      },
      this.ttl,
    );
  }

  /**
   * @returns the post's type, or `null` for an icon label that names no known type
   */
  async detectPostType(driver: BrowserDriver, postUrl: string): Promise<MediaType | null> {
    const path = postUrl.startsWith(INSTAGRAM_URL) ? postUrl.slice(INSTAGRAM_URL.length) : postUrl;
    const thumbnail = await findOptional(driver, css(`a[href='${path}']`), this.timings.wait);
    if (!thumbnail) {
      return MediaType.Photo;
    }

    try {
      const icon = await thumbnail.findElement(css('svg'));
      const label = (await icon.getAttribute('aria-label')) ?? '';
      return POST_TYPE_LABELS[label.toLowerCase()] ?? null;
    } catch (error) {
      if (error instanceof ElementNotFoundError) {
        return MediaType.Photo;
      }
      throw error;
    }
  }

  /**
   * Collects post URLs from the profile feed, scrolling until `maxCount`
   * posts are found or the feed ends. Without `type` every post is kept.
   */
  async collectPostUrls(
    driver: BrowserDriver,
    username: string,
    maxCount?: number,
    type?: MediaType,
  ): Promise<string[]> {
    if (maxCount === 0) {
      return [];
    }
    const limitReached = (count: number) => maxCount !== undefined && count >= maxCount;

    await this.session.openProfile(driver, username);

    const posts: string[] = [];
    let previousPass = new Set<string>();
    let pageEnd = false;

    while (!pageEnd) {
      const anchors = await findAll(driver, tag('a'), this.timings.wait);
      const pass: string[] = [];
      for (const anchor of anchors) {
        const href = await anchor.getAttribute('href');
        if (href && href.includes(POST_PATH_MARKER) && !previousPass.has(href) && !pass.includes(href)) {
          pass.push(href);
        }
      }

      for (const postUrl of pass) {
        if (posts.includes(postUrl)) {
          continue;
        }
        if (type === undefined || (await this.isPostOfType(driver, postUrl, type))) {
          posts.push(postUrl);
        }
        if (limitReached(posts.length)) {
          break;
        }
      }

      this.logger.debug(`${username}: ${posts.length} post(s) after scanning ${pass.length} link(s)`);
      if (limitReached(posts.length)) {
        break;
      }
      previousPass = new Set(pass);
      pageEnd = await this.session.scrollPage(driver);
    }

    return posts;
  }

  /**
   * For each matching post, the first media URL of `type`.
   */
  async collectMediaUrls(
    driver: BrowserDriver,
    username: string,
    type: MediaElementType,
    maxCount?: number,
  ): Promise<string[]> {
    if (maxCount === 0) {
      return [];
    }

    const posts = await this.collectPostUrls(driver, username, maxCount, type);
    const media: string[] = [];
    for (const postUrl of posts) {
      const [first] = await this.getPostMedia(driver, postUrl, type);
      if (first) {
        media.push(first);
      }
    }
    return media;
  }
}
