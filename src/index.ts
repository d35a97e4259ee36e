import { Agent, type AgentOptions } from './lib/agent.js';
import { type AgentConfig, loadConfig } from './lib/config.js';
import * as Crypto from './lib/crypto/index.js';
import { getLogger, setLogLevel } from './lib/logger.js';

export { Agent, Crypto, getLogger, loadConfig, setLogLevel };
export type { AgentConfig, AgentOptions };

export * from './lib/advertising/index.js';
export * from './lib/client/index.js';
export * from './lib/credentials/index.js';
export * from './lib/errors.js';
export * from './lib/framing/index.js';
export * from './lib/operator/index.js';
export * from './lib/pairing/index.js';
export * from './lib/players/index.js';
export * from './lib/relay/index.js';
