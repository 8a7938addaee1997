/**
 * Config Command
 *
 * Manages ~/.course-rag/config.toml via CLI:
 *   course-rag config get <key>          - Get a specific value
 *   course-rag config set <key> <value>  - Set a value
 *   course-rag config list               - Show all configuration
 *   course-rag config path               - Show config file location
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, getConfigValue, listConfig, setConfigValue } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(formatValue).join(', ');
  return JSON.stringify(value);
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., course-rag config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined) {
        throw new ConfigError(`Unknown config key: '${key}'`);
      }

      if (ctx.options.json) {
        ctx.json({ key, value });
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., course-rag config set search.max_results 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);
      const stored = getConfigValue(key);

      if (ctx.options.json) {
        ctx.json({ success: true, key, value: stored });
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatValue(stored))}`);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        ctx.json(Object.fromEntries(entries));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Blank line between top-level sections
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        ctx.json({ path: configPath });
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}
