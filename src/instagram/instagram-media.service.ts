import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrowserService } from '../browser/browser.service';
import { EnvironmentVariables } from '../config/env.validation';
import { cacheKey } from '../redis/cache-key';
import { CacheStore } from '../redis/cache-store';
import { LinksResponse } from './dto/links.response';
import { MediaElementType, MediaType } from './instagram.constants';
import { InstagramScraperService } from './instagram-scraper.service';

/**
 * Entry point for profile lookups. A cached answer is returned without
 * starting a browser; a miss runs the scrape in a fresh session.
 */
@Injectable()
export class InstagramMediaService {
  private readonly logger = new Logger(InstagramMediaService.name);

  constructor(
    private readonly browser: BrowserService,
    private readonly scraper: InstagramScraperService,
    private readonly cache: CacheStore,
    private readonly config: ConfigService<EnvironmentVariables, true>,
  ) {}

  async getProfileMediaUrls(username: string, type: MediaElementType, maxCount?: number): Promise<LinksResponse> {
    if (maxCount === 0) {
      return new LinksResponse();
    }

    const urls = await this.cached('profile-media', { username, type, maxCount }, () =>
      this.browser.withDriver((driver) => this.scraper.collectMediaUrls(driver, username, type, maxCount)),
    );
    this.logger.log(`${username}: ${urls.length} ${type} url(s)`);
    return new LinksResponse(urls);
  }

  async getProfilePostsUrls(username: string, maxCount?: number, type?: MediaType): Promise<LinksResponse> {
    if (maxCount === 0) {
      return new LinksResponse();
    }

    const urls = await this.cached('profile-posts', { username, type, maxCount }, () =>
      this.browser.withDriver((driver) => this.scraper.collectPostUrls(driver, username, maxCount, type)),
    );
    this.logger.log(`${username}: ${urls.length} post url(s)`);
    return new LinksResponse(urls);
  }

  private cached(
    namespace: string,
    args: Record<string, string | number | undefined>,
    compute: () => Promise<string[]>,
  ): Promise<string[]> {
    const key = cacheKey(this.config.get('CACHE_PREFIX', { infer: true }), namespace, args);
    return this.cache.getOrSet(key, compute, this.config.get('CACHE_TTL_SECONDS', { infer: true }));
  }
}
