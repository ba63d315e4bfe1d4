import 'dotenv/config';
import 'reflect-metadata';
import { bootstrapWorker } from '@cadence/worker-core';
import { AppModule } from './app.module';
import { LaunchpadService } from './launchpad/launchpad.service';

async function main(): Promise<void> {
  const app = await bootstrapWorker({ module: AppModule });
  const launchpad = app.get(LaunchpadService);
  try {
    await launchpad.whenStopped();
  } finally {
    // A signal already closes the app through the shutdown hooks.
    if (!launchpad.stopRequested) {
      await app.close();
    }
  }
}

main().catch((err) => {
  console.error('Fatal error', err);
  process.exit(1);
});
