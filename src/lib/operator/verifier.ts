import { createInterface } from 'node:readline';

import { formatShortAuthString } from '../crypto/index.js';
import { PairingError } from '../errors.js';
import { getLogger } from '../logger.js';
import type {
  PairingVerifier,
  VerificationDecision,
  VerificationRequest,
} from '../pairing/types.js';

const ANSWERS: Record<string, VerificationDecision> = {
  y: 'accept',
  yes: 'accept',
  n: 'mismatch',
  no: 'mismatch',
  r: 'reject',
  reject: 'reject',
  b: 'block',
  block: 'block',
};

export function parseDecision(answer: string): VerificationDecision | null {
  return ANSWERS[answer.trim().toLowerCase()] ?? null;
}

export interface ConsoleVerifierOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Asks the operator on the terminal. Requests are answered one at a time in
 * arrival order.
 */
export class ConsoleVerifier implements PairingVerifier {
  private readonly log = getLogger('ConsoleVerifier');
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ConsoleVerifierOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  verify(
    request: VerificationRequest,
    signal: AbortSignal,
  ): Promise<VerificationDecision> {
    const turn = this.queue.then(() => this.prompt(request, signal));
    // each caller observes its own outcome through `turn`
    this.queue = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  private prompt(
    request: VerificationRequest,
    signal: AbortSignal,
  ): Promise<VerificationDecision> {
    if (signal.aborted) {
      return Promise.reject(
        new PairingError('Verification cancelled', 'aborted'),
      );
    }

    const who = request.name
      ? `${request.name} (${request.remoteAddress})`
      : request.remoteAddress;
    this.output.write(
      `\nPairing request from ${who}\n` +
        `Identity: ${request.identity}\n` +
        `Code:     ${formatShortAuthString(request.sas)}\n`,
    );

    const rl = createInterface({
      input: this.input,
      output: this.output,
      terminal: false,
    });

    return new Promise((resolve, reject) => {
      let settled = false;
      const finish = (outcome: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal.removeEventListener('abort', onAbort);
        rl.close();
        outcome();
      };
      const onAbort = (): void => {
        this.output.write('Request withdrawn.\n');
        finish(() =>
          reject(new PairingError('Verification cancelled', 'aborted')),
        );
      };

      signal.addEventListener('abort', onAbort, { once: true });
      rl.once('close', () => {
        finish(() =>
          reject(new PairingError('Operator input closed', 'aborted')),
        );
      });

      const ask = (): void => {
        rl.question(
          'Does the remote device show the same code? [y]es / [n]o / [r]eject / [b]lock: ',
          (answer) => {
            const decision = parseDecision(answer);
            if (!decision) {
              ask();
              return;
            }
            this.log.debug(`Operator answered ${decision} for ${request.sessionId}`);
            finish(() => resolve(decision));
          },
        );
      };
      ask();
    });
  }
}
