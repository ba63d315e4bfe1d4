import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { LoopWorkerMixin, MetricsService, type LoopWorkerExtras } from '@cadence/worker-core';
import {
  buildLaunchpad,
  loadLaunchpadConfig,
  LoopError,
  type BuiltLaunchpad,
  type IterationContext,
} from '@cadence/service-loop';
import { LAUNCHPAD_OPTIONS } from '../constants';
import { HeartbeatService } from './heartbeat.service';
import type { LaunchpadOptions } from './types';

@Injectable()
export class LaunchpadService extends LoopWorkerMixin {
  private built: BuiltLaunchpad | null = null;

  constructor(
    @InjectPinoLogger(LaunchpadService.name) protected readonly logger: PinoLogger,
    private readonly metrics: MetricsService,
    private readonly heartbeat: HeartbeatService,
    @Inject(LAUNCHPAD_OPTIONS) private readonly options: LaunchpadOptions,
  ) {
    super();
  }

  protected get iterMinPeriodMs(): number {
    return this.launchpad().timing.iterMinPeriodMs;
  }

  protected get iterPauseMs(): number {
    return this.launchpad().timing.iterPauseMs;
  }

  get serviceCount(): number {
    return this.built?.launchpad.services.length ?? 0;
  }

  protected async prepare(): Promise<void> {
    const { configFile, registry } = this.options;
    this.logger.info({ configFile }, 'Loading launchpad configuration');
    const config = await loadLaunchpadConfig(configFile);
    this.built = await buildLaunchpad(config, { configFile, registry, logger: this.logger });
    this.heartbeat.start();
  }

  protected async setup(): Promise<void> {
    this.logger.info({ services: this.serviceCount }, 'Setup all services');
    await this.launchpad().launchpad.setup();
  }

  protected loopExtras(): LoopWorkerExtras {
    return {
      metrics: this.metrics,
      heartbeat: this.heartbeat,
      logIterations: this.launchpad().logIterations,
    };
  }

  async runIteration(ctx: IterationContext): Promise<void> {
    await this.launchpad().launchpad.iterate(ctx);
  }

  private launchpad(): BuiltLaunchpad {
    if (!this.built) {
      throw new LoopError('Launchpad is not prepared yet');
    }
    return this.built;
  }
}
