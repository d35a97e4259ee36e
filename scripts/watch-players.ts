#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { DEFAULT_RELAY_PORT } from '../src/constants.js';
import { RelayClient } from '../src/lib/client/index.js';
import { getLogger } from '../src/lib/logger.js';

const log = getLogger('WatchPlayers');

const credentialsSchema = z.object({
  host: z.string(),
  identity: z.string(),
  privateKey: z.string(),
  token: z.string(),
});

/**
 * Subscribes to every player on an agent and prints what happens to them.
 *
 * Usage: tsx scripts/watch-players.ts [credentials-file] [port]
 */
async function main(): Promise<void> {
  const [file = 'relay-credentials.json', portArg] = process.argv.slice(2);
  const credentials = credentialsSchema.parse(
    JSON.parse(await readFile(file, 'utf8')),
  );

  const client = await RelayClient.connect({
    host: credentials.host,
    port: portArg ? Number(portArg) : DEFAULT_RELAY_PORT,
    identity: credentials.identity,
    token: Buffer.from(credentials.token, 'base64'),
  });

  client.on('event', (event) => {
    if (event.type === 'player-disappeared') {
      log.info(`- ${event.playerId}`);
      return;
    }
    const { player } = event;
    const sign = event.type === 'player-appeared' ? '+' : '~';
    log.info(
      `${sign} ${player.name} [${player.playbackState}] ${player.metadata.title ?? ''}`,
    );
  });
  client.on('server-error', ({ code, message }) => {
    log.warn(`Agent reported ${code}: ${message}`);
  });
  client.once('close', () => {
    log.info('Connection closed');
    process.exit(0);
  });

  const players = await client.subscribe('*');
  log.info(`Watching ${players.length} player(s)`);
  for (const player of players) {
    log.info(`  ${player.id} (${player.name}) ${player.capabilities.join(', ')}`);
  }

  process.on('SIGINT', () => {
    client.close();
  });
}

main().catch((error) => {
  log.error('Watch failed:', error);
  process.exit(1);
});
