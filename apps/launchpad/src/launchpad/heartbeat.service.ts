import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { Heartbeat } from '@cadence/heartbeat';
import type { HeartbeatLike } from '@cadence/service-loop';
import { HEARTBEAT_INTERVAL_MS, HEARTBEAT_LOOP_STALE_MS, HEARTBEAT_PATH } from '../constants';

@Injectable()
export class HeartbeatService implements HeartbeatLike {
  private readonly heartbeat: Heartbeat;

  constructor(
    @InjectPinoLogger(HeartbeatService.name)
    private readonly logger: PinoLogger,
  ) {
    this.heartbeat = new Heartbeat({
      path: process.env.HEARTBEAT_PATH || HEARTBEAT_PATH,
      intervalMs: HEARTBEAT_INTERVAL_MS,
      staleMs: HEARTBEAT_LOOP_STALE_MS,
      onStale: (loopAge) => this.logger.warn({ loopAge }, 'Service loop stale, skipping heartbeat'),
      onError: (err) => this.logger.warn({ err }, 'Heartbeat write failed'),
    });
  }

  start() {
    this.heartbeat.start();
  }

  stop() {
    this.heartbeat.stop();
  }

  touch() {
    this.heartbeat.touch();
  }
}
