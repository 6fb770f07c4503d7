import { HandshakeMessage, handshakeMessage, isHandshake } from '../message';
import {
  CommonSession,
  CommonSessionListeners,
  CommonSessionProps,
  SessionState,
} from './common';

export interface SessionHandshakingListeners extends CommonSessionListeners {
  onHandshakeComplete: (msg: HandshakeMessage) => void;
  onHandshakeMismatch: (msg: HandshakeMessage) => void;

  // timeout related
  onHandshakeTimeout: () => void;
}

export interface SessionHandshakingProps extends CommonSessionProps {
  listeners: SessionHandshakingListeners;
}

/*
 * A session that has announced itself and is waiting for the peer to echo
 * the handshake back. The handshake is retransmitted until the echo
 * arrives or the handshake timeout fires.
 * See transitions.ts for valid transitions.
 */
export class SessionHandshaking extends CommonSession {
  readonly state = SessionState.Handshaking as const;
  listeners: SessionHandshakingListeners;
  handshakesSent = 0;

  handshakeTimeout?: ReturnType<typeof setTimeout>;
  retryInterval?: ReturnType<typeof setInterval>;

  constructor(props: SessionHandshakingProps) {
    super(props);
    this.listeners = props.listeners;

    this.conn.addDataListener(this.onHandshakeData);
    this.conn.addErrorListener(this.listeners.onConnectionErrored);
    this.conn.addCloseListener(this.listeners.onConnectionClosed);

    this.handshakeTimeout = setTimeout(() => {
      this.listeners.onHandshakeTimeout();
    }, this.options.handshakeTimeoutMs);

    this.sendHandshake();
    this.retryInterval = setInterval(() => {
      this.sendHandshake();
    }, this.options.handshakeRetryIntervalMs);
  }

  sendHandshake() {
    const res = this.sendControlMessage(
      handshakeMessage(this.id, this.options.protocol),
    );
    this.handshakesSent++;

    if (!res.ok) {
      this.log?.warn(
        `failed to send handshake: ${res.reason}`,
        this.loggingMetadata,
      );
    }
  }

  onHandshakeData = (msg: Uint8Array) => {
    const parsed = this.codec.fromBuffer(msg);
    if (!parsed.ok) {
      this.log?.warn(`received malformed control message during handshake`, {
        ...this.loggingMetadata,
        validationErrors: parsed.validationErrors,
        tags: ['invalid-control-message'],
      });
      this.listeners.onInvalidMessage(parsed.reason);
      return;
    }

    const reply = parsed.value;
    if (!isHandshake(reply)) {
      return;
    }

    if (reply.id !== this.id || reply.protocol !== this.options.protocol) {
      this.listeners.onHandshakeMismatch(reply);
      return;
    }

    this.listeners.onHandshakeComplete(reply);
  };

  _handleConsume(): void {
    this.conn.removeDataListener(this.onHandshakeData);
    this.conn.removeErrorListener(this.listeners.onConnectionErrored);
    this.conn.removeCloseListener(this.listeners.onConnectionClosed);

    clearTimeout(this.handshakeTimeout);
    this.handshakeTimeout = undefined;
    clearInterval(this.retryInterval);
    this.retryInterval = undefined;
  }
}
