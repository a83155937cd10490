#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { loadConfig } from '../config/config';
import { generateSecret } from '../crypto/cryptoConfig';
import { main as serve } from '../index';
import { ExpirySweeper } from '../jobs/expirySweeper';
import { StorageManager } from '../storage/StorageManager';
import { VERSION } from '../app';

// Load environment variables
dotenv.config();

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function purgeExpired(): Promise<void> {
  const config = loadConfig();
  const storageManager = new StorageManager(config);

  try {
    const provider = await storageManager.initialize();
    const sweeper = new ExpirySweeper({
      provider,
      dayspan: config.retention.dayspan,
      batchSize: config.sweeper.batchSize
    });

    const deleted = await sweeper.runSweep();
    console.log(chalk.green(`✅ Removed ${deleted} expired texts (older than ${config.retention.dayspan} days)`));
  } finally {
    await storageManager.cleanup();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pastevault')
    .description('Ephemeral text storage, encrypted per item')
    .version(VERSION);

  program
    .command('serve')
    .description('Start the HTTP API')
    .argument('[host]', 'hostname to bind to')
    .argument('[port]', 'TCP port to bind to', parsePort)
    .action(async (host?: string, port?: number) => {
      await serve({ host, port });
    });

  program
    .command('purge')
    .description('Delete expired texts once and exit')
    .action(async () => {
      try {
        await purgeExpired();
      } catch (error) {
        console.error(chalk.red('❌ Purge failed:'), error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  program
    .command('generate-secret')
    .description('Print a random value for the SECRET variable')
    .action(() => {
      console.log(chalk.cyan('🔑 Add this to your environment:'));
      console.log(`SECRET=${generateSecret()}`);
      console.log(chalk.yellow('⚠️  Changing SECRET makes every stored text unreadable'));
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch((error) => {
    console.error(chalk.red('❌'), error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
