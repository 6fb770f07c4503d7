import {
  SessionHandshaking,
  SessionHandshakingListeners,
} from './SessionHandshaking';
import {
  SessionSteadyState,
  SessionSteadyStateListeners,
} from './SessionSteadyState';
import { CommonSessionProps, inheritSharedSession } from './common';

export const SessionStateGraph = {
  entrypoints: {
    Handshaking: (
      props: CommonSessionProps,
      listeners: SessionHandshakingListeners,
    ): SessionHandshaking => {
      const session = new SessionHandshaking({ ...props, listeners });

      session.log?.info(
        `session ${session.id} created in Handshaking state`,
        {
          ...session.loggingMetadata,
          tags: ['state-transition'],
        },
      );

      return session;
    },
  },
  // All of the transitions 'move'/'consume' the old session and return a new one.
  // After a session is transitioned, any usage of the old session will throw.
  transition: {
    HandshakingToSteadyState: (
      oldSession: SessionHandshaking,
      listeners: SessionSteadyStateListeners,
    ): SessionSteadyState => {
      const carriedState = inheritSharedSession(oldSession);
      const handshakesSent = oldSession.handshakesSent;
      oldSession._handleConsume();

      const session = new SessionSteadyState({
        ...carriedState,
        listeners,
      });

      session.log?.info(
        `session ${session.id} transition from Handshaking to SteadyState after ${handshakesSent} handshake(s)`,
        {
          ...session.loggingMetadata,
          tags: ['state-transition'],
        },
      );

      return session;
    },
  },
} as const;
