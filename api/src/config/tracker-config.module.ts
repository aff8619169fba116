import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TRACKER_CONFIG, trackerConfigProvider } from './tracker.config';

/** Parses the tracker settings once and shares them with every module. */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [trackerConfigProvider],
  exports: [TRACKER_CONFIG],
})
export class TrackerConfigModule {}
