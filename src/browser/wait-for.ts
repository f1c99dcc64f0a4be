import { BrowserElement, ElementNotFoundError, ElementSearch, Locator } from './browser-driver';

export interface WaitOptions {
  attempts: number;
  intervalMs: number;
}

export const DEFAULT_WAIT: WaitOptions = { attempts: 10, intervalMs: 1000 };

type ErrorClass = abstract new (...args: never[]) => Error;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calls `action` until it resolves, pausing `intervalMs` between tries.
 * The last error is rethrown once `attempts` are used up; an error that is
 * an instance of one of `fatal` is rethrown at once.
 */
export async function waitFor<T>(
  action: () => Promise<T>,
  options: WaitOptions = DEFAULT_WAIT,
  fatal: readonly ErrorClass[] = [],
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await action();
    } catch (error) {
      if (attempt >= options.attempts || fatal.some((type) => error instanceof type)) {
        throw error;
      }
      await sleep(options.intervalMs);
    }
  }
}

/**
 * Waits for a matching element; `null` when it never shows up.
 */
export async function findOptional(
  scope: ElementSearch,
  locator: Locator,
  options: WaitOptions = DEFAULT_WAIT,
): Promise<BrowserElement | null> {
  try {
    return await waitFor(() => scope.findElement(locator), options);
  } catch (error) {
    if (error instanceof ElementNotFoundError) {
      return null;
    }
    throw error;
  }
}

export function findAll(
  scope: ElementSearch,
  locator: Locator,
  options: WaitOptions = DEFAULT_WAIT,
): Promise<BrowserElement[]> {
  return waitFor(() => scope.findElements(locator), options);
}
