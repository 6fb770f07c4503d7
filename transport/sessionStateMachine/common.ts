import { Logger, MessageMetadata } from '../../logging';
import { TelemetryInfo } from '../../tracing';
import { ControlMessageAdapter } from '../../codec';
import { Consumable } from '../../util/consumable';
import { Connection } from '../connection';
import { ControlMessage } from '../message';
import { SessionOptions } from '../options';
import { SendResult } from '../results';

export const enum SessionState {
  Handshaking = 'Handshaking',
  SteadyState = 'SteadyState',
  Terminating = 'Terminating',
}

// all session states have these
export interface CommonSessionProps {
  id: bigint;
  conn: Connection;
  options: SessionOptions;
  codec: ControlMessageAdapter;
  telemetry: TelemetryInfo;
  /** Wall-clock ms at which the session started. */
  startedAt: number;
  log?: Logger;
}

export interface CommonSessionListeners {
  onConnectionClosed: () => void;
  onConnectionErrored: (err: Error) => void;
  onInvalidMessage: (reason: string) => void;
}

export abstract class CommonSession extends Consumable {
  abstract readonly state: SessionState;
  readonly id: bigint;
  readonly conn: Connection;
  readonly options: SessionOptions;
  readonly codec: ControlMessageAdapter;
  readonly telemetry: TelemetryInfo;
  readonly startedAt: number;
  log?: Logger;

  constructor({
    id,
    conn,
    options,
    codec,
    telemetry,
    startedAt,
    log,
  }: CommonSessionProps) {
    super();
    this.id = id;
    this.conn = conn;
    this.options = options;
    this.codec = codec;
    this.telemetry = telemetry;
    this.startedAt = startedAt;
    this.log = log;
  }

  get loggingMetadata(): MessageMetadata {
    const metadata: MessageMetadata = {
      ...this.conn.loggingMetadata,
      sessionId: this.id.toString(),
    };

    if (this.telemetry.span.isRecording()) {
      const spanContext = this.telemetry.span.spanContext();
      metadata.telemetry = {
        traceId: spanContext.traceId,
        spanId: spanContext.spanId,
      };
    }

    return metadata;
  }

  sendControlMessage(msg: ControlMessage): SendResult {
    const buff = this.codec.toBuffer(msg);
    if (!buff.ok) {
      return buff;
    }

    if (!this.conn.send(buff.value)) {
      return {
        ok: false,
        reason: 'failed to send control message',
      };
    }

    return { ok: true, value: undefined };
  }
}

export function inheritSharedSession(session: CommonSession): CommonSessionProps {
  return {
    id: session.id,
    conn: session.conn,
    options: session.options,
    codec: session.codec,
    telemetry: session.telemetry,
    startedAt: session.startedAt,
    log: session.log,
  };
}
