export {
  PairingClient,
  type PairOptions,
  type PairResult,
} from './pairing-client.js';
export {
  RelayClient,
  type RelayClientOptions,
  type RelayServerError,
} from './relay-client.js';
