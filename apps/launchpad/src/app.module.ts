import { Module } from '@nestjs/common';
import { workerLoggerModule } from '@cadence/worker-core';
import { LaunchpadModule } from './launchpad/launchpad.module';

@Module({
  imports: [workerLoggerModule(), LaunchpadModule],
})
export class AppModule {}
