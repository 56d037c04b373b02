import dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import { resolveDirectory } from './helper/resolveDirectory.js';
import type { Settings } from './types.js';

export function loadEnv() {
  if (!process.env.VITEST) {
    const isDevelopment = process.argv[0].includes('tsx') || process.env.NODE_ENV === 'development';

    if (isDevelopment) {
      dotenv.config({ path: '.env.local' });
    } else {
      dotenv.config({ path: path.join(os.homedir(), '.vacation-planner/.env') });
    }
  }
}

/**
 * Directory settings: explicit overrides first, then the environment, then
 * `conf/` and `vacationplans/` under the working directory.
 */
export function loadSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    confPath: resolveDirectory(overrides.confPath ?? process.env.VACATION_PLANNER_CONF_PATH, 'conf'),
    outputPath: resolveDirectory(
      overrides.outputPath ?? process.env.VACATION_PLANNER_OUTPUT_PATH,
      'vacationplans'
    ),
  };
}
