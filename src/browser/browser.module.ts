import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { BROWSER_DRIVER_FACTORY, BrowserDriverFactory } from './browser-driver';
import { BrowserService } from './browser.service';
import { SeleniumBrowserDriver } from './selenium-browser-driver';

export function seleniumDriverFactory(config: ConfigService<EnvironmentVariables, true>): BrowserDriverFactory {
  const driverPath = config.get('CHROMEDRIVER_PATH', { infer: true });
  const chromeBinary = config.get('CHROME_BINARY', { infer: true });
  return () => SeleniumBrowserDriver.launch({ driverPath, chromeBinary });
}

@Module({
  providers: [
    {
      provide: BROWSER_DRIVER_FACTORY,
      useFactory: seleniumDriverFactory,
      inject: [ConfigService],
    },
    BrowserService,
  ],
  exports: [BrowserService],
})
export class BrowserModule {}
