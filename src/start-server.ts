#!/usr/bin/env node
import 'dotenv/config';
import { ConfigManager } from './config/manager.js';
import { GateOrchestrator } from './mcp/orchestrator.js';
import { DelegatedToolServer } from './mcp/server.js';
import { sanitizeError } from './utils/errors.js';

/**
 * Start the delegated tool server
 *
 * Configuration comes from the JSON file named by CONFIG_PATH when set,
 * otherwise from AZURE_* / BASE_URL / SERVER_* / GATE_MODE variables (a
 * `.env` file is loaded first).
 */
async function main(): Promise<void> {
  const configManager = new ConfigManager();
  const configPath = process.env.CONFIG_PATH;
  const config = configPath
    ? await configManager.loadConfig(configPath)
    : configManager.fromEnvironment();

  const context = await new GateOrchestrator({ config }).buildContext();
  const server = new DelegatedToolServer(context);
  await server.start();

  const shutdown = (signal: string) => {
    console.log(`\n\nReceived ${signal}, shutting down server...`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', sanitizeError(error));
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', sanitizeError(error));
  process.exit(1);
});
