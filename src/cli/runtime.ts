/**
 * CLI Runtime
 *
 * Builds the command context and the services commands run against.
 * Commands receive services as a parameter so tests can swap in an
 * in-memory index and a scripted model.
 */

import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import { z } from 'zod';
import {
  createCourseAssistant,
  createCourseIndex,
  type CourseAssistant,
} from '../agent/index.js';
import { loadConfig, loadEnv, type Config } from '../config/index.js';
import type { CourseVectorIndex } from '../search/index.js';
import type { Logger } from '../utils/index.js';
import type { CommandContext, GlobalOptions } from './types.js';

/**
 * Everything a command needs beyond its arguments.
 */
export interface CommandServices {
  loadConfig(): Config;
  openIndex(config: Config, logger: Logger): CourseVectorIndex;
  openAssistant(config: Config, logger: Logger): CourseAssistant;
}

export const defaultServices: CommandServices = {
  loadConfig: () => loadConfig(),
  openIndex: (config, logger) => createCourseIndex(config, loadEnv(), { logger }),
  openAssistant: (config, logger) => createCourseAssistant(config, loadEnv(), { logger }),
};

/**
 * Create a command context with logging utilities
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
    json: (value: unknown) => {
      console.log(JSON.stringify(value, null, 2));
    },
  };
}

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json (two levels up from both src/cli and dist/cli).
 */
export function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    // Running from an unusual layout
    return '0.0.0';
  }
}
