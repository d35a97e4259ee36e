import { EventEmitter } from 'node:events';
import * as net from 'node:net';
import type { ZodType } from 'zod';

import type { CredentialStoreInterface, TrustRecord } from '../credentials/index.js';
import { formatShortAuthString } from '../crypto/index.js';
import {
  NetworkError,
  PairingError,
  type PairingFailureReason,
  errorMessage,
} from '../errors.js';
import { JsonSocket } from '../framing/index.js';
import { getLogger } from '../logger.js';
import { PAIRING_DEFAULTS, PAIRING_PROTOCOL_VERSION } from './constants.js';
import {
  type ResultMessage,
  clientHelloSchema,
  confirmSchema,
} from './messages.js';
import { type ExchangedKeys, PairingSession } from './pairing-session.js';
import type {
  Notifier,
  PairingFailure,
  PairingServerOptions,
  PairingVerifier,
  TerminalFailureState,
  VerificationDecision,
} from './types.js';

interface FailedOutcome {
  kind: 'failed';
  state: TerminalFailureState;
  reason: PairingFailureReason;
  message: string;
  block?: boolean;
}

type Outcome = { kind: 'approved'; source: 'local' | 'remote' } | FailedOutcome;

function failed(
  state: TerminalFailureState,
  reason: PairingFailureReason,
  message: string,
): FailedOutcome {
  return { kind: 'failed', state, reason, message };
}

function outcomeForDecision(decision: VerificationDecision): Outcome {
  switch (decision) {
    case 'accept':
      return { kind: 'approved', source: 'local' };
    case 'mismatch':
      return failed('REJECTED', 'mismatch', 'Operator reported different codes');
    case 'reject':
      return failed('REJECTED', 'rejected', 'Operator rejected the pairing');
    case 'block':
      return {
        ...failed('REJECTED', 'rejected', 'Operator rejected the pairing'),
        block: true,
      };
  }
}

export interface PairingServer {
  on(event: 'paired', listener: (record: TrustRecord) => void): this;
  on(event: 'pairing-failed', listener: (failure: PairingFailure) => void): this;
  once(event: 'paired', listener: (record: TrustRecord) => void): this;
  once(
    event: 'pairing-failed',
    listener: (failure: PairingFailure) => void,
  ): this;
  emit(event: 'paired', record: TrustRecord): boolean;
  emit(event: 'pairing-failed', failure: PairingFailure): boolean;
}

/**
 * Accepts pairing handshakes and mints trust records for the ones both
 * operators confirm.
 */
export class PairingServer extends EventEmitter {
  private readonly log = getLogger('PairingServer');
  private server: net.Server | undefined;
  private readonly sessions = new Map<string, PairingSession>();
  private readonly sockets = new Set<JsonSocket>();
  private readonly blockedAddresses = new Set<string>();
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly confirmationTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly maxPendingSessions: number;

  constructor(
    private readonly store: CredentialStoreInterface,
    private readonly verifier: PairingVerifier,
    private readonly notifier: Notifier,
    options: PairingServerOptions = {},
  ) {
    super();
    this.host = options.host ?? '0.0.0.0';
    this.requestedPort = options.port ?? 0;
    this.confirmationTimeoutMs =
      options.confirmationTimeoutMs ?? PAIRING_DEFAULTS.CONFIRMATION_TIMEOUT_MS;
    this.handshakeTimeoutMs =
      options.handshakeTimeoutMs ?? PAIRING_DEFAULTS.HANDSHAKE_TIMEOUT_MS;
    this.maxPendingSessions =
      options.maxPendingSessions ?? PAIRING_DEFAULTS.MAX_PENDING_SESSIONS;
  }

  /** Port actually bound, useful when listening on port 0 */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : 0;
  }

  get pendingSessions(): number {
    return this.sessions.size;
  }

  isBlocked(address: string): boolean {
    return this.blockedAddresses.has(address);
  }

  async start(): Promise<void> {
    if (this.server) {
      throw new NetworkError('Pairing server already started');
    }
    const server = net.createServer((socket) => {
      this.handleConnection(new JsonSocket(socket)).catch((error: unknown) => {
        this.log.error('Unexpected pairing failure:', error);
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.requestedPort, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error) => {
      this.log.error('Pairing listener error:', error);
    });

    this.server = server;
    this.log.info(`Pairing server listening on ${this.host}:${this.port}`);
  }

  /** Stops listening and aborts every pending handshake */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    this.log.info('Pairing server stopped');
  }

  private async handleConnection(socket: JsonSocket): Promise<void> {
    const session = new PairingSession(socket.remoteAddress);
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));

    try {
      if (this.isBlocked(session.remoteAddress)) {
        await this.finishWithFailure(
          session,
          socket,
          failed('ABORTED', 'blocked', 'Address is blocked'),
        );
        return;
      }
      if (this.sessions.size >= this.maxPendingSessions) {
        await this.finishWithFailure(
          session,
          socket,
          failed('ABORTED', 'busy', 'Too many pending pairing requests'),
        );
        return;
      }

      this.sessions.set(session.id, session);
      this.log.debug(
        `Pairing session ${session.id} opened by ${socket.remoteEndpoint}`,
      );
      await this.runHandshake(session, socket);
    } finally {
      this.sessions.delete(session.id);
      session.destroy();
      socket.close();
    }
  }

  private async runHandshake(
    session: PairingSession,
    socket: JsonSocket,
  ): Promise<void> {
    let keys: ExchangedKeys;
    try {
      const hello = await this.receiveParsed(
        socket,
        clientHelloSchema,
        this.handshakeTimeoutMs,
      );
      if (hello.version !== PAIRING_PROTOCOL_VERSION) {
        throw new PairingError(
          `Unsupported pairing protocol version ${hello.version}`,
          'protocol',
        );
      }
      keys = session.exchangeKeys(hello);
      await socket.send({
        type: 'hello',
        version: PAIRING_PROTOCOL_VERSION,
        sessionId: session.id,
        ephemeralKey: session.localEphemeralKey.toString('base64'),
      });
      session.awaitConfirmation();
    } catch (error) {
      await this.finishWithFailure(session, socket, outcomeForError(error));
      return;
    }

    const label = session.name ? `'${session.name}'` : keys.identity.slice(0, 12);
    this.log.info(
      `Pairing request from ${label} at ${session.remoteAddress}, code ${formatShortAuthString(keys.sas)}`,
    );
    this.notifier.notify(
      'Media relay pairing request',
      `${label} wants to pair. Verify code ${formatShortAuthString(keys.sas)}.`,
    );

    const outcome = await this.awaitApproval(session, socket, keys);
    if (outcome.kind === 'failed') {
      if (outcome.block) {
        this.blockedAddresses.add(session.remoteAddress);
        this.log.warn(`Blocking further pairing requests from ${session.remoteAddress}`);
      }
      await this.finishWithFailure(session, socket, outcome);
      return;
    }

    const material = session.trustMaterial();
    let record: TrustRecord;
    try {
      record = await this.store.put(material.identity, {
        publicKey: material.publicKey,
        token: material.token,
        name: session.name,
      });
    } catch (error) {
      this.log.error(`Failed to store trust record for ${material.identity}:`, error);
      await this.finishWithFailure(
        session,
        socket,
        failed('ABORTED', 'aborted', 'Trust record could not be stored'),
      );
      return;
    } finally {
      material.token.fill(0);
    }
    session.establish();

    this.log.info(`Paired with ${label} (${record.identity})`);
    await this.sendResult(socket, {
      type: 'result',
      sessionId: session.id,
      status: 'paired',
      identity: record.identity,
    });
    this.emit('paired', record);
  }

  /**
   * Waits for both the local decision and the remote confirmation. The
   * first negative answer, a disconnect or the timeout ends the wait.
   */
  private async awaitApproval(
    session: PairingSession,
    socket: JsonSocket,
    keys: ExchangedKeys,
  ): Promise<Outcome> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    const timeout = new Promise<Outcome>((resolve) => {
      timeoutId = setTimeout(() => {
        resolve(
          failed(
            'TIMED_OUT',
            'timeout',
            `No confirmation within ${this.confirmationTimeoutMs}ms`,
          ),
        );
      }, this.confirmationTimeoutMs);
    });
    const closed = new Promise<Outcome>((resolve) => {
      if (socket.isClosed) {
        resolve(failed('ABORTED', 'aborted', 'Remote party disconnected'));
      }
      socket.once('close', () => {
        resolve(failed('ABORTED', 'aborted', 'Remote party disconnected'));
      });
    });

    const sources = {
      local: this.verifier
        .verify(
          {
            sessionId: session.id,
            remoteAddress: session.remoteAddress,
            identity: keys.identity,
            name: session.name,
            sas: keys.sas,
          },
          controller.signal,
        )
        .then(outcomeForDecision, (error: unknown) =>
          failed('ABORTED', 'aborted', `Verification failed: ${errorMessage(error)}`),
        ),
      remote: this.receiveParsed(socket, confirmSchema)
        .then((confirm): Outcome =>
          session.checkConfirmation(confirm)
            ? { kind: 'approved', source: 'remote' }
            : failed('REJECTED', 'mismatch', 'Remote party reported different codes'),
        )
        .catch(outcomeForError),
    };

    const pending = new Set<'local' | 'remote'>(['local', 'remote']);
    try {
      while (pending.size > 0) {
        const outcome = await Promise.race([
          ...[...pending].map((source) => sources[source]),
          timeout,
          closed,
        ]);
        if (outcome.kind === 'failed') {
          return outcome;
        }
        pending.delete(outcome.source);
      }
      return { kind: 'approved', source: 'local' };
    } finally {
      clearTimeout(timeoutId);
      controller.abort();
    }
  }

  private async finishWithFailure(
    session: PairingSession,
    socket: JsonSocket,
    outcome: FailedOutcome,
  ): Promise<void> {
    session.fail(outcome.state, outcome.reason);
    this.log.warn(
      `Pairing session ${session.id} from ${session.remoteAddress} ended ${outcome.state} (${outcome.reason}): ${outcome.message}`,
    );
    await this.sendResult(socket, {
      type: 'result',
      sessionId: session.id,
      status: 'failed',
      reason: outcome.reason,
      message: outcome.message,
    });
    this.emit('pairing-failed', {
      sessionId: session.id,
      remoteAddress: session.remoteAddress,
      state: outcome.state,
      reason: outcome.reason,
      message: outcome.message,
    });
  }

  private async sendResult(
    socket: JsonSocket,
    result: ResultMessage,
  ): Promise<void> {
    if (socket.isClosed) {
      return;
    }
    try {
      await socket.send(result);
    } catch (error) {
      this.log.debug(`Could not deliver pairing result: ${errorMessage(error)}`);
    }
  }

  private async receiveParsed<T>(
    socket: JsonSocket,
    schema: ZodType<T>,
    timeoutMs?: number,
  ): Promise<T> {
    const message = await socket.receive(timeoutMs);
    const parsed = schema.safeParse(message);
    if (!parsed.success) {
      throw new PairingError('Unexpected pairing message', 'protocol');
    }
    return parsed.data;
  }
}

function outcomeForError(error: unknown): FailedOutcome {
  if (error instanceof PairingError) {
    return {
      kind: 'failed',
      state: 'ABORTED',
      reason: error.reason,
      message: error.message,
    };
  }
  if (error instanceof NetworkError) {
    return {
      kind: 'failed',
      state: 'ABORTED',
      reason: 'aborted',
      message: error.message,
    };
  }
  return {
    kind: 'failed',
    state: 'ABORTED',
    reason: 'protocol',
    message: errorMessage(error),
  };
}
