import { ServiceConfigError } from '@cadence/service-loop';
import { CONFIG_FILE_FLAG, LAUNCHPAD_CONFIG_ENV } from '../constants';

/**
 * Finds the launchpad configuration file: `--config-file <path>` or
 * `--config-file=<path>` on the command line wins over LAUNCHPAD_CONFIG.
 */
export function resolveConfigFile(argv: readonly string[], env: NodeJS.ProcessEnv): string {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    let value: string | undefined;
    if (arg === CONFIG_FILE_FLAG) {
      value = argv[i + 1];
    } else if (arg.startsWith(`${CONFIG_FILE_FLAG}=`)) {
      value = arg.slice(CONFIG_FILE_FLAG.length + 1);
    } else {
      continue;
    }
    if (!value || value.startsWith('--')) {
      throw new ServiceConfigError(`${CONFIG_FILE_FLAG} requires a path`);
    }
    return value;
  }

  const fromEnv = env[LAUNCHPAD_CONFIG_ENV];
  if (fromEnv) return fromEnv;
  throw new ServiceConfigError('Configuration file is not set');
}
