#!/usr/bin/env node
import { parseArgs } from 'node:util';

import { Agent } from './lib/agent.js';
import { type ConfigOverrides, loadConfig } from './lib/config.js';
import { CredentialStore } from './lib/credentials/index.js';
import { errorMessage } from './lib/errors.js';
import { getLogger, isLogLevel, setLogLevel } from './lib/logger.js';

const log = getLogger('MediaRelayAgent');

const USAGE = `Usage: media-relay-agent [command] [options]

Commands:
  run                    Start the agent (default)
  list-pairings          Print the paired clients
  revoke <identity>      Forget one paired client
  reset-pairings         Forget every paired client

Options:
  --bind <address>       Address both listeners bind to
  --relay-port <port>    Relay listener port
  --pairing-port <port>  Pairing listener port
  --credentials-dir <d>  Directory holding the trust records
  --log-level <level>    error, warn, info, debug, verbose or silly
  --no-advertise         Do not publish the relay over mDNS
  -h, --help             Show this help`;

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      bind: { type: 'string' },
      'relay-port': { type: 'string' },
      'pairing-port': { type: 'string' },
      'credentials-dir': { type: 'string' },
      'log-level': { type: 'string' },
      'no-advertise': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

function parsePort(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`${flag} expects a port number, got '${value}'`);
  }
  return port;
}

async function runAgent(agent: Agent): Promise<void> {
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info(`Received ${signal}, shutting down`);
    try {
      await agent.stop();
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGUSR2', () => {
    agent.resetPairings().catch((error: unknown) => {
      log.error('Failed to reset pairings:', error);
    });
  });

  await agent.start();
}

async function main(): Promise<void> {
  const { values, positionals } = parseCommandLine(process.argv.slice(2));
  if (values.help) {
    console.log(USAGE);
    return;
  }

  const logLevel = values['log-level'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`Unknown log level '${logLevel}'`);
  }
  const overrides: ConfigOverrides = {
    bindAddress: values.bind,
    relayPort: parsePort(values['relay-port'], '--relay-port'),
    pairingPort: parsePort(values['pairing-port'], '--pairing-port'),
    credentialsDir: values['credentials-dir'],
    logLevel,
  };
  const config = loadConfig(process.env, overrides);
  setLogLevel(config.logLevel);

  const [command = 'run', ...rest] = positionals;
  switch (command) {
    case 'run':
      await runAgent(new Agent({ config, advertise: !values['no-advertise'] }));
      return;
    case 'list-pairings': {
      const store = new CredentialStore({ directory: config.credentialsDir });
      await store.open();
      const records = store.list();
      if (records.length === 0) {
        console.log('No paired clients');
      }
      for (const record of records) {
        console.log(`${record.identity}  ${record.name ?? '-'}  ${record.createdAt}`);
      }
      await store.close();
      return;
    }
    case 'revoke': {
      const [identity] = rest;
      if (!identity) {
        throw new Error('revoke expects an identity');
      }
      const store = new CredentialStore({ directory: config.credentialsDir });
      await store.open();
      const removed = await store.revoke(identity);
      await store.close();
      if (!removed) {
        throw new Error(`No pairing for ${identity}`);
      }
      console.log(`Revoked ${identity}`);
      return;
    }
    case 'reset-pairings': {
      const store = new CredentialStore({ directory: config.credentialsDir });
      await store.open();
      const removed = await store.clear();
      await store.close();
      console.log(`Removed ${removed} pairing(s)`);
      return;
    }
    default:
      console.error(USAGE);
      throw new Error(`Unknown command '${command}'`);
  }
}

main().catch((error: unknown) => {
  log.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
