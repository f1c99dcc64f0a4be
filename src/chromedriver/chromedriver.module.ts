import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { appConfigModule } from '../config/app-config';
import { ChromedriverService } from './chromedriver.service';

@Module({
  imports: [HttpModule],
  providers: [ChromedriverService],
  exports: [ChromedriverService],
})
export class ChromedriverModule {}

/**
 * Standalone root used by the primary process, which provisions the driver
 * before any HTTP worker exists.
 */
@Module({
  imports: [appConfigModule(), ChromedriverModule],
})
export class ProvisioningModule {}
