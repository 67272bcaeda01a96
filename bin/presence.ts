#!/usr/bin/env node

/**
 * CLI entry point for agent-presence
 */

import { Command } from 'commander';
import { emitKeypressEvents } from 'readline';
import chalk from 'chalk';
import { StatusStore } from '../src/state/index.js';
import { StatusWriter } from '../src/status/writer.js';
import { ConfigManager } from '../src/config/index.js';
import { DisplayLoop, DEFAULT_INTERVAL_MS } from '../src/display/loop.js';
import { TerminalRenderer } from '../src/display/renderer.js';
import { systemClock } from '../src/infra/clock.js';
import { PRESENCE_STATES } from '../src/types/index.js';
import { runClear, runConfig, runShowStatus, runStatus, type ConfigOptions } from '../src/cli/commands.js';

// ConfigManager loads .env, so PRESENCE_HOME set there also locates state.json
function openStores(): { configManager: ConfigManager; store: StatusStore } {
  const configManager = new ConfigManager();
  return { configManager, store: new StatusStore(undefined, configManager.getConfigDir()) };
}

const program = new Command();

program
  .name('presence')
  .description('Ambient terminal status display for autonomous agents')
  .version('0.1.0');

// Status command - invoked by the agent on every action
program
  .command('status')
  .description(`Set the current status (${[...PRESENCE_STATES].sort().join(', ')})`)
  .argument('[state]', 'New state')
  .argument('[message...]', 'Optional status message')
  .option('-s, --show', 'Show persisted and effective status')
  .option('-c, --clear', 'Remove the status record')
  .addHelpText('after', `
Examples:
  presence status work "Building feature"
  presence status think Analyzing data
  presence status idle`)
  .action((state: string | undefined, message: string[], options: { show?: boolean; clear?: boolean }, command: Command) => {
    const { configManager, store } = openStores();

    if (options.clear) {
      process.exit(runClear(store));
    }
    if (options.show) {
      process.exit(runShowStatus(store, configManager, systemClock));
    }
    if (!state) {
      command.outputHelp();
      process.exit(1);
    }

    process.exit(runStatus(new StatusWriter(store), state, message));
  });

// Display command - long-running renderer
program
  .command('display')
  .description('Run the full-screen status display (q or Esc to quit)')
  .option('-i, --interval <ms>', 'Refresh interval in milliseconds', String(DEFAULT_INTERVAL_MS))
  .action((options: { interval: string }) => {
    const intervalMs = parseInt(options.interval, 10);
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      console.error(chalk.red(`Invalid interval: ${options.interval}`));
      process.exit(1);
    }

    const { configManager, store } = openStores();
    console.log(chalk.cyan(`📺 Presence display starting (${intervalMs}ms refresh)`));
    console.log(chalk.gray(`   Status file: ${store.getStatePath()}`));
    console.log(chalk.gray(`   Config file: ${configManager.getConfigPath()}`));

    const loop = new DisplayLoop(store, configManager, new TerminalRenderer(process.stdout), { intervalMs });

    const shutdown = (): void => {
      loop.stop();
      if (process.stdin.isTTY) process.stdin.setRawMode(false);
      console.log(chalk.gray('📺 Presence display stopped'));
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    process.on('SIGWINCH', () => {
      loop.refresh();
      loop.tick();
    });

    if (process.stdin.isTTY) {
      emitKeypressEvents(process.stdin);
      process.stdin.setRawMode(true);
      process.stdin.on('keypress', (_str: string | undefined, key: { name?: string; ctrl?: boolean } | undefined) => {
        if (!key) return;
        if (key.name === 'q' || key.name === 'escape' || (key.ctrl && key.name === 'c')) {
          shutdown();
        }
      });
    }
    process.stdin.resume();

    loop.start();
  });

// Config command - one-time setup, may be re-run while the display is up
program
  .command('config')
  .description('Configure the display')
  .option('-l, --letter <letter>', 'Monogram letter (A-Z)')
  .option('-n, --name <name>', 'Display name shown at the bottom')
  .option('-t, --timeout <seconds>', 'Auto-idle timeout in seconds (0 to disable)')
  .option('--sleep <window>', 'Daily sleep window in hours, e.g. 23-7')
  .option('--no-sleep', 'Disable the sleep window')
  .option('-s, --show', 'Show current configuration as JSON')
  .addHelpText('after', `
Examples:
  presence config --letter A --name AGENT
  presence config --timeout 600
  presence config --sleep 23-7`)
  .action((options: ConfigOptions) => {
    process.exit(runConfig(new ConfigManager(), options));
  });

program.parse();
