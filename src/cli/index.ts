#!/usr/bin/env node

/**
 * CLI entry point for the retro emulator agent
 */

import { Command } from 'commander';
import { CLIManager } from './cli-manager';
import { ConfigManager, DEFAULT_CONFIG_FILE } from './config-manager';
import { version } from '../../package.json';

const program = new Command();
const configManager = new ConfigManager();
const cliManager = new CLIManager(configManager);

program
  .name('retro-agent')
  .description('Status and control agent for a retro-computer emulator process')
  .version(version)
  .enablePositionalOptions()
  .option('-c, --config <path>', 'path to configuration file', DEFAULT_CONFIG_FILE)
  .option('-v, --verbose', 'enable verbose logging')
  .option('--debug', 'enable debug logging')
  .hook('preAction', async (thisCommand) => {
    await cliManager.initialize(thisCommand.opts());
  });

program
  .command('start')
  .description('Start the agent and watch the emulator process')
  .option('-H, --host <host>', 'address to bind')
  .option('-p, --port <number>', 'port to listen on')
  .option('-n, --process-name <name>', 'emulator executable name')
  .option('-s, --status-file <path>', 'launcher status file')
  .option('--poll-interval <ms>', 'reconciliation interval in milliseconds')
  .option('--probe-timeout <ms>', 'probe timeout in milliseconds')
  .option('--simulated', 'start in SIMULATED mode')
  .action(async (options) => {
    await cliManager.handleStart(options);
  });

program
  .command('status')
  .description('Show emulator status reported by a running agent')
  .option('-u, --url <url>', 'agent base URL')
  .option('-j, --json', 'output in JSON format')
  .action(async (options) => {
    await cliManager.handleStatus(options);
  });

program
  .command('mode')
  .description('Switch the operating mode of a running agent')
  .argument('<mode>', 'REAL or SIMULATED')
  .option('-u, --url <url>', 'agent base URL')
  .option('-j, --json', 'output in JSON format')
  .action(async (mode, options) => {
    await cliManager.handleMode(mode, options);
  });

program
  .command('state')
  .description('Force the simulated emulator state (SIMULATED mode only)')
  .argument('<running>', 'true/false, on/off or running/stopped')
  .option('-d, --demo <name>', 'demo reported as running')
  .option('-u, --url <url>', 'agent base URL')
  .option('-j, --json', 'output in JSON format')
  .action(async (running, options) => {
    await cliManager.handleState(running, options);
  });

const configCmd = program
  .command('config')
  .description('Configuration management commands');

configCmd
  .command('show')
  .description('Show current configuration')
  .option('-j, --json', 'output in JSON format')
  .action(async (options) => {
    await cliManager.handleConfigShow(options);
  });

configCmd
  .command('init')
  .description('Initialize configuration file')
  .option('-f, --force', 'overwrite existing configuration')
  .option('-t, --template <name>', 'use configuration template', 'default')
  .action(async (options) => {
    await cliManager.handleConfigInit(options);
  });

configCmd
  .command('validate')
  .description('Validate configuration file')
  .option('-c, --config <path>', 'path to configuration file to validate')
  .action(async (options) => {
    await cliManager.handleConfigValidate(options);
  });

program.exitOverride();

async function shutdown(signal: string): Promise<void> {
  console.log(`\nReceived ${signal}, shutting down gracefully...`);
  try {
    await cliManager.cleanup();
    process.exit(0);
  } catch (error) {
    console.error('Shutdown failed:', error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled Rejection:', reason);
    process.exit(1);
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

// Only run main if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { program, cliManager, configManager, main };
