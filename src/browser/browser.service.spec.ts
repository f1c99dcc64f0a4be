import { Test } from '@nestjs/testing';
import { BROWSER_DRIVER_FACTORY } from './browser-driver';
import { BrowserService } from './browser.service';
import { FakeBrowserDriver } from './testing/fake-browser-driver';

describe('BrowserService', () => {
  let service: BrowserService;
  let driver: FakeBrowserDriver;
  let factory: jest.Mock;

  beforeEach(async () => {
    driver = new FakeBrowserDriver();
    factory = jest.fn().mockResolvedValue(driver);

    const module = await Test.createTestingModule({
      providers: [BrowserService, { provide: BROWSER_DRIVER_FACTORY, useValue: factory }],
    }).compile();

    service = module.get(BrowserService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('runs the work with a fresh driver and closes it', async () => {
    const result = await service.withDriver(async (session) => {
      await session.get('https://example.test');
      return 'done';
    });

    expect(result).toBe('done');
    expect(factory).toHaveBeenCalledTimes(1);
    expect(driver.visited).toEqual(['https://example.test']);
    expect(driver.quitCalls).toBe(1);
  });

  it('closes the driver when the work fails', async () => {
    await expect(
      service.withDriver(async () => {
        throw new Error('scrape failed');
      }),
    ).rejects.toThrow('scrape failed');

    expect(driver.quitCalls).toBe(1);
  });

  it('keeps the work result when closing fails', async () => {
    jest.spyOn(driver, 'quit').mockRejectedValue(new Error('already gone'));

    await expect(service.withDriver(async () => 42)).resolves.toBe(42);
  });
});
