import { Type, Static } from '@sinclair/typebox';

/**
 * Kind of data-plane transport a session intends to probe over.
 * Carried on the wire as an unsigned integer.
 */
export enum ProbeProtocol {
  Udp = 0,
  /**
   * Reliable stream transport. Declared so it can be negotiated, not yet
   * implemented by any flow factory.
   */
  Tcp = 1,
}

export const ProbeProtocolSchema = Type.Enum(ProbeProtocol);

/**
 * Declares the session's identity and the transport it intends to use.
 * The peer signals completion by echoing the same message back.
 */
export const ControlMessageHandshakeSchema = Type.Object({
  type: Type.Literal('HANDSHAKE'),
  id: Type.BigInt({ minimum: 0n, maximum: 0xffff_ffff_ffff_ffffn }),
  protocol: ProbeProtocolSchema,
});

/**
 * Every message that may travel over the control channel. New kinds
 * (acknowledgement, parameter changes, graceful close) are added here
 * and to the session's dispatch table.
 */
export const ControlMessageSchema = Type.Union([ControlMessageHandshakeSchema]);

export type HandshakeMessage = Static<typeof ControlMessageHandshakeSchema>;
export type ControlMessage = Static<typeof ControlMessageSchema>;
export type ControlMessageType = ControlMessage['type'];

export function handshakeMessage(
  id: bigint,
  protocol: ProbeProtocol,
): HandshakeMessage {
  return {
    type: 'HANDSHAKE',
    id,
    protocol,
  } satisfies HandshakeMessage;
}

export function isHandshake(msg: ControlMessage): msg is HandshakeMessage {
  return msg.type === 'HANDSHAKE';
}
