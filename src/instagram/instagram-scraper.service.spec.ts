import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { FakeBrowserDriver, FakeElement } from '../browser/testing/fake-browser-driver';
import { CacheStore } from '../redis/cache-store';
import { InMemoryCacheService } from '../redis/in-memory-cache.service';
import { MediaType, SCRAPER_TIMINGS, ScraperTimings } from './instagram.constants';
import { InstagramScraperService } from './instagram-scraper.service';
import { InstagramSessionService } from './instagram-session.service';
import { UserNotFoundException } from './user-not-found.exception';

const TIMINGS: ScraperTimings = { wait: { attempts: 1, intervalMs: 0 }, scrollPauseMs: 0 };
const HOME = 'https://www.instagram.com';
const PROFILE = `${HOME}/alice`;
const POSTS_TAB = "xpath=//span[contains(text(), 'Posts')]";
const PHOTO = "css=img[style='object-fit: cover;']";
const VIDEO = "css=video[type='video/mp4']";

function thumbnail(path: string, label?: string): FakeElement {
  const icon: Record<string, FakeElement[]> = label ? { 'css=svg': [new FakeElement({ 'aria-label': label })] } : {};
  return new FakeElement({ href: `${HOME}${path}` }, icon);
}

/**
 * alice has a photo post, a clip and a carousel of two photos, plus one
 * link that is not a post.
 */
function aliceProfile(heights: number[] = [500]): FakeBrowserDriver {
  const photo = thumbnail('/p/photo1/');
  const clip = thumbnail('/p/clip1/', 'Clip');
  const carousel = thumbnail('/p/carousel1/', 'Carousel');
  const explore = new FakeElement({ href: `${HOME}/explore/` });

  return new FakeBrowserDriver(heights)
    .page(PROFILE, {
      [POSTS_TAB]: [new FakeElement()],
      'tag=a': [explore, photo, clip, carousel],
      "css=a[href='/p/photo1/']": [photo],
      "css=a[href='/p/clip1/']": [clip],
      "css=a[href='/p/carousel1/']": [carousel],
    })
    .page(`${HOME}/p/photo1/`, {
      [PHOTO]: [new FakeElement({ src: 'https://cdn.test/photo1.jpg' })],
    })
    .page(`${HOME}/p/clip1/`, {
      [VIDEO]: [new FakeElement({ src: 'https://cdn.test/clip1.mp4' })],
    })
    .page(`${HOME}/p/carousel1/`, {
      [PHOTO]: [
        new FakeElement({ src: 'https://cdn.test/carousel1-a.jpg' }),
        new FakeElement({ src: 'https://cdn.test/carousel1-b.jpg' }),
      ],
    });
}

describe('InstagramScraperService', () => {
  let scraper: InstagramScraperService;

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      providers: [
        InstagramScraperService,
        InstagramSessionService,
        { provide: CacheStore, useValue: new InMemoryCacheService() },
        { provide: ConfigService, useValue: new ConfigService({ CACHE_PREFIX: 'test', CACHE_TTL_SECONDS: 15 }) },
        { provide: SCRAPER_TIMINGS, useValue: TIMINGS },
      ],
    }).compile();

    scraper = module.get(InstagramScraperService);
  });

  describe('detectPostType', () => {
    it('reads the icon label of the thumbnail', async () => {
      const driver = aliceProfile();
      await driver.get(PROFILE);

      await expect(scraper.detectPostType(driver, `${HOME}/p/clip1/`)).resolves.toBe(MediaType.Clip);
      await expect(scraper.detectPostType(driver, `${HOME}/p/carousel1/`)).resolves.toBe(MediaType.Carousel);
    });

    it('treats a thumbnail without an icon as a photo', async () => {
      const driver = aliceProfile();
      await driver.get(PROFILE);

      await expect(scraper.detectPostType(driver, `${HOME}/p/photo1/`)).resolves.toBe(MediaType.Photo);
    });

    it('returns null for an unknown label', async () => {
      const driver = new FakeBrowserDriver().page(PROFILE, {
        "css=a[href='/p/x/']": [thumbnail('/p/x/', 'Reel')],
      });
      await driver.get(PROFILE);

      await expect(scraper.detectPostType(driver, `${HOME}/p/x/`)).resolves.toBeNull();
    });
  });

  describe('isPostOfType', () => {
    it('opens a carousel to look for the type and returns to the feed', async () => {
      const driver = aliceProfile();
      await driver.get(PROFILE);

      await expect(scraper.isPostOfType(driver, `${HOME}/p/carousel1/`, MediaType.Photo)).resolves.toBe(true);
      expect(driver.visited).toEqual([PROFILE, `${HOME}/p/carousel1/`, PROFILE]);
    });

    it('rejects a carousel without the type', async () => {
      const driver = aliceProfile();
      await driver.get(PROFILE);

      await expect(scraper.isPostOfType(driver, `${HOME}/p/carousel1/`, MediaType.Clip)).resolves.toBe(false);
    });

    it('answers a carousel query without leaving the feed', async () => {
      const driver = aliceProfile();
      await driver.get(PROFILE);

      await expect(scraper.isPostOfType(driver, `${HOME}/p/carousel1/`, MediaType.Carousel)).resolves.toBe(true);
      expect(driver.visited).toEqual([PROFILE]);
    });
  });

  describe('collectPostUrls', () => {
    it('returns nothing for a zero limit without opening the profile', async () => {
      const driver = aliceProfile();

      await expect(scraper.collectPostUrls(driver, 'alice', 0)).resolves.toEqual([]);
      expect(driver.visited).toEqual([]);
    });

    it('collects every post link when no type is given', async () => {
      const driver = aliceProfile();

      await expect(scraper.collectPostUrls(driver, 'alice')).resolves.toEqual([
        `${HOME}/p/photo1/`,
        `${HOME}/p/clip1/`,
        `${HOME}/p/carousel1/`,
      ]);
    });

    it('keeps only posts of the requested type', async () => {
      const driver = aliceProfile();

      await expect(scraper.collectPostUrls(driver, 'alice', undefined, MediaType.Clip)).resolves.toEqual([
        `${HOME}/p/clip1/`,
      ]);
    });

    it('stops at the limit without scrolling', async () => {
      const driver = aliceProfile();

      await expect(scraper.collectPostUrls(driver, 'alice', 1)).resolves.toEqual([`${HOME}/p/photo1/`]);
      expect(driver.scriptCalls).toBe(0);
    });

    it('skips links already seen on the previous pass', async () => {
      const driver = aliceProfile([500, 900, 900]);

      await expect(scraper.collectPostUrls(driver, 'alice', 10)).resolves.toHaveLength(3);
      expect(driver.scriptCalls).toBe(4);
    });

    it('fails for an unknown user', async () => {
      const driver = new FakeBrowserDriver();

      await expect(scraper.collectPostUrls(driver, 'ghost', 3)).rejects.toBeInstanceOf(UserNotFoundException);
    });
  });

  describe('collectMediaUrls', () => {
    it('returns the first photo of each photo or carousel post', async () => {
      const driver = aliceProfile();

      await expect(scraper.collectMediaUrls(driver, 'alice', MediaType.Photo, 5)).resolves.toEqual([
        'https://cdn.test/photo1.jpg',
        'https://cdn.test/carousel1-a.jpg',
      ]);
    });

    it('returns clip sources for clips', async () => {
      const driver = aliceProfile();

      await expect(scraper.collectMediaUrls(driver, 'alice', MediaType.Clip, 5)).resolves.toEqual([
        'https://cdn.test/clip1.mp4',
      ]);
    });

    it('serves repeated post lookups from the cache', async () => {
      const first = aliceProfile();
      await scraper.collectMediaUrls(first, 'alice', MediaType.Photo, 5);

      const second = aliceProfile();
      await scraper.collectMediaUrls(second, 'alice', MediaType.Photo, 5);

      expect(second.visited).toEqual([PROFILE]);
    });
  });
});
