import type { Session, SessionExit } from './session';
import type { SessionState } from './sessionStateMachine/common';
import type { ProbeProtocol } from './message';

type SessionStatus = 'connect' | 'disconnect';
export type ServerStatus = 'listening' | 'shutting_down' | 'closed';

export const ProtocolError = {
  InvalidControlMessage: 'invalid_control_message',
  HandshakeFailed: 'handshake_failed',
} as const;

export type ProtocolErrorType =
  (typeof ProtocolError)[keyof typeof ProtocolError];

/**
 * One echoed probe as seen by the originating session.
 */
export interface ProbeEcho {
  sessionId: bigint;
  flowId: string;
  seq: bigint;
  rttMs: number;
}

export interface EventMap {
  sessionStatus: {
    status: SessionStatus;
    session: Session;
    exit?: SessionExit;
  };
  sessionTransition: {
    state: SessionState;
    session: Session;
  };
  probeEcho: ProbeEcho;
  protocolError: {
    type: ProtocolErrorType;
    message: string;
    sessionId?: bigint;
  };
  serverStatus: {
    status: ServerStatus;
  };
  handshake: {
    sessionId: bigint;
    protocol: ProbeProtocol;
  };
}

export type EventTypes = keyof EventMap;
export type EventHandler<K extends EventTypes> = (
  event: EventMap[K],
) => unknown;

export class EventDispatcher<T extends EventTypes> {
  private eventListeners: { [K in T]?: Set<EventHandler<K>> } = {};

  removeAllListeners() {
    this.eventListeners = {};
  }

  numberOfListeners<K extends T>(eventType: K) {
    return this.eventListeners[eventType]?.size ?? 0;
  }

  addEventListener<K extends T>(eventType: K, handler: EventHandler<K>) {
    if (!this.eventListeners[eventType]) {
      this.eventListeners[eventType] = new Set();
    }

    this.eventListeners[eventType]?.add(handler);
  }

  removeEventListener<K extends T>(eventType: K, handler: EventHandler<K>) {
    this.eventListeners[eventType]?.delete(handler);
  }

  dispatchEvent<K extends T>(eventType: K, event: EventMap[K]) {
    const handlers = this.eventListeners[eventType];
    if (handlers) {
      // copying ensures that adding more listeners in a handler doesn't
      // affect the current dispatch.
      const copy = [...handlers];
      for (const handler of copy) {
        handler(event);
      }
    }
  }
}
