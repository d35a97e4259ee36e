import { randomBytes } from 'node:crypto';

import {
  type IdentityKeyPair,
  createEd25519Signature,
  deriveConfirmationKey,
  deriveSharedSecret,
  deriveShortAuthString,
  deriveTrustToken,
  encryptChaCha20Poly1305,
  generateEphemeralKeyPair,
  identityFromPublicKey,
  pairingSignaturePayload,
} from '../crypto/index.js';
import { NetworkError, PairingError, errorMessage } from '../errors.js';
import { JsonSocket } from '../framing/index.js';
import { getLogger } from '../logger.js';
import {
  CONFIRMATION_NONCE_LENGTH,
  PAIRING_DEFAULTS,
  PAIRING_PROTOCOL_VERSION,
} from '../pairing/constants.js';
import { agentHelloSchema, resultSchema } from '../pairing/messages.js';

const log = getLogger('PairingClient');

/** Extra time granted to the agent's answer beyond its own confirmation timeout */
const RESULT_GRACE_MS = 5000;

export interface PairOptions {
  host: string;
  port: number;
  identity: IdentityKeyPair;
  name?: string;
  /**
   * Shows the code to the local operator; resolves true when it matches the
   * one the agent displays
   */
  confirm: (sas: string) => Promise<boolean>;
  timeoutMs?: number;
}

export interface PairResult {
  identity: string;
  token: Buffer;
  sas: string;
}

/** Remote side of the pairing handshake */
export class PairingClient {
  /**
   * Runs one pairing attempt
   * @throws PairingError carrying the reason the agent reported
   */
  async pair(options: PairOptions): Promise<PairResult> {
    const timeoutMs = options.timeoutMs ?? PAIRING_DEFAULTS.CONFIRMATION_TIMEOUT_MS;
    let socket: JsonSocket;
    try {
      socket = await JsonSocket.connect(options.host, options.port);
    } catch (error) {
      throw new PairingError(
        `Cannot reach pairing port ${options.host}:${options.port}`,
        'aborted',
        { cause: error },
      );
    }

    try {
      return await this.handshake(socket, options, timeoutMs);
    } catch (error) {
      if (error instanceof PairingError) {
        throw error;
      }
      throw new PairingError(`Pairing aborted: ${errorMessage(error)}`, 'aborted', {
        cause: error,
      });
    } finally {
      socket.close();
    }
  }

  private async handshake(
    socket: JsonSocket,
    options: PairOptions,
    timeoutMs: number,
  ): Promise<PairResult> {
    const ephemeral = generateEphemeralKeyPair();
    const identity = identityFromPublicKey(options.identity.publicKey);

    await this.sendTolerant(socket, {
      type: 'hello',
      version: PAIRING_PROTOCOL_VERSION,
      ephemeralKey: ephemeral.publicKey.toString('base64'),
      identityKey: options.identity.publicKey.toString('base64'),
      name: options.name,
    });

    const reply = await socket.receive(PAIRING_DEFAULTS.HANDSHAKE_TIMEOUT_MS);
    const early = resultSchema.safeParse(reply);
    if (early.success && early.data.status === 'failed') {
      throw new PairingError(
        early.data.message ?? 'Pairing refused',
        early.data.reason ?? 'aborted',
      );
    }
    const hello = agentHelloSchema.safeParse(reply);
    if (!hello.success) {
      throw new PairingError('Unexpected reply to hello', 'protocol');
    }
    if (hello.data.version !== PAIRING_PROTOCOL_VERSION) {
      throw new PairingError(
        `Agent speaks pairing protocol version ${hello.data.version}`,
        'protocol',
      );
    }

    const agentEphemeralKey = Buffer.from(hello.data.ephemeralKey, 'base64');
    const sharedSecret = deriveSharedSecret(
      ephemeral.privateKey,
      agentEphemeralKey,
    );
    const sessionId = hello.data.sessionId;
    const sas = deriveShortAuthString(
      sharedSecret,
      agentEphemeralKey,
      ephemeral.publicKey,
    );
    log.debug(`Pairing session ${sessionId} established key agreement`);

    const accepted = await options.confirm(sas);
    if (accepted) {
      const nonce = randomBytes(CONFIRMATION_NONCE_LENGTH);
      const signature = createEd25519Signature(
        pairingSignaturePayload(
          agentEphemeralKey,
          ephemeral.publicKey,
          options.identity.publicKey,
        ),
        options.identity.privateKey,
      );
      const payload = encryptChaCha20Poly1305(signature, {
        key: deriveConfirmationKey(sharedSecret, sessionId),
        nonce,
        aad: Buffer.from(sessionId, 'utf8'),
      });
      await this.sendTolerant(socket, {
        type: 'confirm',
        sessionId,
        accepted: true,
        nonce: nonce.toString('base64'),
        payload: payload.toString('base64'),
      });
    } else {
      await this.sendTolerant(socket, { type: 'confirm', sessionId, accepted: false });
    }

    let message: unknown;
    try {
      message = await socket.receive(timeoutMs + RESULT_GRACE_MS);
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new PairingError(error.message, 'aborted', { cause: error });
      }
      throw error;
    }
    const result = resultSchema.safeParse(message);
    if (!result.success || result.data.sessionId !== sessionId) {
      throw new PairingError('Unexpected pairing result', 'protocol');
    }
    if (result.data.status === 'failed') {
      throw new PairingError(
        result.data.message ?? 'Pairing failed',
        result.data.reason ?? 'aborted',
      );
    }
    if (result.data.identity !== identity) {
      throw new PairingError('Agent confirmed a different identity', 'protocol');
    }

    const token = deriveTrustToken(sharedSecret, identity);
    sharedSecret.fill(0);
    return { identity, token, sas };
  }

  /** The agent may have answered and closed already; its answer stays in the inbox */
  private async sendTolerant(socket: JsonSocket, message: unknown): Promise<void> {
    try {
      await socket.send(message);
    } catch (error) {
      if (!(error instanceof NetworkError)) {
        throw error;
      }
      log.debug(`Agent stopped reading: ${error.message}`);
    }
  }
}
