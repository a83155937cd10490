import dotenv from 'dotenv';
import type { Server } from 'http';

// Load environment variables
dotenv.config();
import { createApp } from './app';
import { loadConfig } from './config/config';
import { buildCryptoConfig } from './crypto/cryptoConfig';
import { ExpirySweeper } from './jobs/expirySweeper';
import { SecureItemStore } from './storage/SecureItemStore';
import { StorageManager } from './storage/StorageManager';

export interface ServerOptions {
  host?: string;
  port?: number;
}

export interface RunningServer {
  server: Server;
  shutdown: () => Promise<void>;
}

/**
 * Wire storage, crypto, sweeper and HTTP app together and start listening
 */
export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
  console.log('🔄 Initializing PasteVault...');

  const config = loadConfig();
  const storageManager = new StorageManager(config);
  const cryptoConfig = buildCryptoConfig({
    secret: config.secret,
    requireSecret: storageManager.isDurable
  });

  const provider = await storageManager.initialize();
  const store = new SecureItemStore({ provider, cryptoConfig, retention: config.retention });

  const sweeper = new ExpirySweeper({
    provider,
    dayspan: config.retention.dayspan,
    schedule: config.sweeper.schedule,
    batchSize: config.sweeper.batchSize
  });
  sweeper.start();

  const app = createApp({ store, config, sweeper });
  const host = options.host ?? config.host;
  const port = options.port ?? config.port;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });

  console.log(`🚀 PasteVault API running on http://${host}:${port}`);
  console.log(`🗄️ Storage: ${provider.name}`);
  console.log(`⏰ Texts expire after ${config.retention.dayspan} days`);
  console.log(`📦 Max text length: ${config.retention.maxLength} chars`);
  console.log(`🌍 Environment: ${config.nodeEnv}`);

  const shutdown = async () => {
    console.log('🔄 Shutting down gracefully...');
    sweeper.stop();
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    await storageManager.cleanup();
    console.log('✅ Cleanup completed');
  };

  return { server, shutdown };
}

function handleSignals(running: RunningServer): void {
  const onSignal = () => {
    running.shutdown()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('❌ Error during cleanup:', error);
        process.exit(1);
      });
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}

export async function main(options: ServerOptions = {}): Promise<void> {
  try {
    const running = await startServer(options);
    handleSignals(running);
  } catch (error) {
    console.error('❌ Failed to start server:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
