import { Module } from '@nestjs/common';
import { BrowserModule } from '../browser/browser.module';
import { DEFAULT_SCRAPER_TIMINGS, SCRAPER_TIMINGS } from './instagram.constants';
import { InstagramController } from './instagram.controller';
import { InstagramMediaService } from './instagram-media.service';
import { InstagramScraperService } from './instagram-scraper.service';
import { InstagramSessionService } from './instagram-session.service';

@Module({
  imports: [BrowserModule],
  controllers: [InstagramController],
  providers: [
    { provide: SCRAPER_TIMINGS, useValue: DEFAULT_SCRAPER_TIMINGS },
    InstagramSessionService,
    InstagramScraperService,
    InstagramMediaService,
  ],
})
export class InstagramModule {}
