export const LEGACY_DRIVER_INDEX_URL = 'https://chromedriver.storage.googleapis.com';
export const CHROME_FOR_TESTING_URL = 'https://edgedl.me.gvt1.com/edgedl/chrome/chrome-for-testing';

/** Marker the legacy index returns (inside an XML error body) for an unknown release. */
export const MISSING_RELEASE_MARKER = 'NoSuchKey';

export interface ChromeVersion {
  /** Dotted four-part build, e.g. `118.0.5993.70`. */
  full: string;
  major: string;
}

export type DriverSource =
  | { kind: 'legacy'; version: string; url: string }
  | { kind: 'chrome-for-testing'; version: string; url: string };

/**
 * Parses the output of `google-chrome --product-version`.
 */
export function parseChromeVersion(output: string): ChromeVersion {
  const match = /(\d+)\.(\d+)\.(\d+)\.(\d+)/.exec(output);
  if (!match) {
    throw new Error(`Unrecognised Chrome version output: "${output.trim()}"`);
  }
  return { full: match[0], major: match[1] };
}

export function isMissingRelease(body: string): boolean {
  return body.trim() === '' || body.includes(MISSING_RELEASE_MARKER);
}

export function legacyDriverSource(release: string): DriverSource {
  const version = release.trim();
  return {
    kind: 'legacy',
    version,
    url: `${LEGACY_DRIVER_INDEX_URL}/${version}/chromedriver_linux64.zip`,
  };
}

export function chromeForTestingSource(chrome: ChromeVersion): DriverSource {
  return {
    kind: 'chrome-for-testing',
    version: chrome.full,
    url: `${CHROME_FOR_TESTING_URL}/${chrome.full}/linux64/chromedriver-linux64.zip`,
  };
}

/**
 * Picks the download for a driver matching `chrome`, given the body the
 * legacy index returned for `LATEST_RELEASE_<major>`.
 */
export function selectDriverSource(chrome: ChromeVersion, latestRelease: string): DriverSource {
  return isMissingRelease(latestRelease)
    ? chromeForTestingSource(chrome)
    : legacyDriverSource(latestRelease);
}
