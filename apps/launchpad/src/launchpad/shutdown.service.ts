import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { HeartbeatService } from './heartbeat.service';
import { LaunchpadService } from './launchpad.service';

@Injectable()
export class ShutdownService implements OnApplicationShutdown {
  constructor(
    @InjectPinoLogger(ShutdownService.name) private readonly logger: PinoLogger,
    private readonly launchpadService: LaunchpadService,
    private readonly heartbeat: HeartbeatService,
  ) {}

  async onApplicationShutdown(signal?: string) {
    this.logger.info({ signal }, 'Stopping launchpad');
    await this.launchpadService
      .stop()
      .catch((err) => this.logger.warn({ err }, 'LaunchpadService stop failed'));
    this.heartbeat.stop();
  }
}
