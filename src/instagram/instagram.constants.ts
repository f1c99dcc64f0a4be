import { DEFAULT_WAIT, WaitOptions } from '../browser/wait-for';

export const INSTAGRAM_URL = 'https://www.instagram.com';

export enum MediaType {
  Photo = 'photo',
  Clip = 'clip',
  Carousel = 'carousel',
}

/** Types that render as a single media element; a carousel is a container of them. */
export type MediaElementType = Exclude<MediaType, MediaType.Carousel>;

export const MEDIA_SELECTORS: Record<MediaElementType, string> = {
  [MediaType.Photo]: "img[style='object-fit: cover;']",
  [MediaType.Clip]: "video[type='video/mp4']",
};

/** Post thumbnails mark non-photo posts with an svg icon labelled by type. */
export const POST_TYPE_LABELS: Record<string, MediaType> = {
  clip: MediaType.Clip,
  carousel: MediaType.Carousel,
};

export const POST_PATH_MARKER = '/p/';

export const SELECTORS = {
  usernameInput: "input[name='username']",
  passwordInput: "input[name='password']",
  submitButton: "button[type='submit']",
  notNowButton: "//button[contains(text(), 'Not Now')]",
  postsTab: "//span[contains(text(), 'Posts')]",
} as const;

export const SCROLL_SCRIPT =
  'window.scrollTo(0, document.body.scrollHeight);' +
  'var scrolldown=document.body.scrollHeight;return scrolldown;';

export interface ScraperTimings {
  wait: WaitOptions;
  /** Pause after a scroll so the feed can load the next page. */
  scrollPauseMs: number;
}

export const DEFAULT_SCRAPER_TIMINGS: ScraperTimings = {
  wait: DEFAULT_WAIT,
  scrollPauseMs: 5000,
};

export const SCRAPER_TIMINGS = Symbol('SCRAPER_TIMINGS');
