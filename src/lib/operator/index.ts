export { CommandNotifier, NullNotifier } from './notifier.js';
export {
  ConsoleVerifier,
  parseDecision,
  type ConsoleVerifierOptions,
} from './verifier.js';
