import type { ServiceRegistry } from '@cadence/service-loop';

export interface LaunchpadOptions {
  configFile: string;
  /** Factories reachable by plain service names. */
  registry: ServiceRegistry;
}
