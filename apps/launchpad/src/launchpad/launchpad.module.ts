import { Module } from '@nestjs/common';
import { MetricsService } from '@cadence/worker-core';
import { ServiceRegistry } from '@cadence/service-loop';
import { LAUNCHPAD_OPTIONS } from '../constants';
import { resolveConfigFile } from './config-file';
import { HeartbeatService } from './heartbeat.service';
import { LaunchpadService } from './launchpad.service';
import { ShutdownService } from './shutdown.service';
import type { LaunchpadOptions } from './types';

@Module({
  providers: [
    {
      provide: LAUNCHPAD_OPTIONS,
      useFactory: (): LaunchpadOptions => ({
        configFile: resolveConfigFile(process.argv.slice(2), process.env),
        registry: new ServiceRegistry(),
      }),
    },
    MetricsService,
    HeartbeatService,
    LaunchpadService,
    ShutdownService,
  ],
  exports: [LaunchpadService],
})
export class LaunchpadModule {}
