#!/usr/bin/env tsx
import { writeFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';

import { PairingClient } from '../src/lib/client/index.js';
import { DEFAULT_PAIRING_PORT } from '../src/constants.js';
import {
  exportIdentityPrivateKey,
  generateIdentityKeyPair,
} from '../src/lib/crypto/index.js';
import { getLogger } from '../src/lib/logger.js';

const log = getLogger('PairWithAgent');

/**
 * Pairs with a running agent and writes the resulting credentials to a file
 * that watch-players.ts can use.
 *
 * Usage: tsx scripts/pair-with-agent.ts <host> [port] [credentials-file]
 */
async function main(): Promise<void> {
  const [host = '127.0.0.1', portArg, outFile = 'relay-credentials.json'] =
    process.argv.slice(2);
  const port = portArg ? Number(portArg) : DEFAULT_PAIRING_PORT;

  const identity = generateIdentityKeyPair();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const result = await new PairingClient().pair({
      host,
      port,
      identity,
      name: 'pair-with-agent script',
      confirm: async (sas) => {
        const answer = await rl.question(
          `Does the agent show ${sas}? [y/n] `,
        );
        return /^y(es)?$/i.test(answer.trim());
      },
    });

    await writeFile(
      outFile,
      JSON.stringify(
        {
          host,
          identity: result.identity,
          privateKey: exportIdentityPrivateKey(identity),
          token: result.token.toString('base64'),
        },
        null,
        2,
      ),
      { mode: 0o600 },
    );
    log.info(`Paired as ${result.identity}; credentials written to ${outFile}`);
  } finally {
    rl.close();
  }
}

main().catch((error) => {
  log.error('Pairing failed:', error);
  process.exit(1);
});
