#!/usr/bin/env npx tsx
/**
 * mcgate bot process
 *
 * 1. Loads settings and environment
 * 2. Builds the orchestration engine over the Docker runtime
 * 3. Connects the Discord client (unless MCGATE_CLIENT_OFF=true)
 */

import { loadConfig } from '@mcgate/core';
import { buildRouter } from './bootstrap.js';
import { ServerBot } from './server-bot.js';

let bot: ServerBot | null = null;
let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`[Main] Received ${signal}, shutting down gracefully...`);

  try {
    if (bot) await bot.stop();
  } catch (err) {
    console.error('[Main] Error during shutdown:', err);
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.devMode) {
    console.debug = () => {};
  }

  console.log(
    `[Main] Target ${config.settings.server.version} (tag ${config.versionTag}), ` +
    `cooldown ${config.settings.server.restartThresholdSeconds}s, volumes at ${config.settings.volumes.root}`,
  );

  const router = buildRouter(config);

  if (config.clientOff || !config.discordToken) {
    console.log('[Main] Client launch disabled, not contacting the Discord gateway');
    return;
  }

  bot = new ServerBot({
    token: config.discordToken,
    router,
    channelId: config.channelMode ? config.channelId : undefined,
    devMode: config.devMode,
  });

  process.on('SIGINT', () => { void shutdown('SIGINT'); });
  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

  await bot.start();
}

main().catch((err) => {
  console.error('[Main] Fatal error:', err);
  process.exit(1);
});
