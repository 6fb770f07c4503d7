import { describe, expect, test, vitest } from 'vitest';
import { EventDispatcher, ProbeEcho, ProtocolError } from './events';

function dummyEcho(seq = 1n): ProbeEcho {
  return {
    sessionId: 42n,
    flowId: 'flow-test',
    seq,
    rttMs: 1.5,
  };
}

describe('EventDispatcher', () => {
  test('notifies all handlers in order they were registered', () => {
    const dispatcher = new EventDispatcher();

    const calls: Array<string> = [];
    const handler1 = vitest.fn(() => calls.push('first'));
    const handler2 = vitest.fn(() => calls.push('second'));
    const serverStatusHandler = vitest.fn();

    dispatcher.addEventListener('probeEcho', handler1);
    dispatcher.addEventListener('probeEcho', handler2);
    dispatcher.addEventListener('serverStatus', serverStatusHandler);

    expect(dispatcher.numberOfListeners('probeEcho')).toEqual(2);

    const echo = dummyEcho();
    dispatcher.dispatchEvent('probeEcho', echo);

    expect(handler1).toHaveBeenCalledWith(echo);
    expect(handler2).toHaveBeenCalledWith(echo);
    expect(calls).toStrictEqual(['first', 'second']);
    expect(serverStatusHandler).toHaveBeenCalledTimes(0);
  });

  test('does not notify removed handlers', () => {
    const dispatcher = new EventDispatcher();

    const handler = vitest.fn();
    dispatcher.addEventListener('protocolError', handler);
    dispatcher.dispatchEvent('protocolError', {
      type: ProtocolError.InvalidControlMessage,
      message: 'bad frame',
    });
    dispatcher.removeEventListener('protocolError', handler);
    dispatcher.dispatchEvent('protocolError', {
      type: ProtocolError.HandshakeFailed,
      message: 'wrong id',
    });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({
      type: 'invalid_control_message',
      message: 'bad frame',
    });
    expect(dispatcher.numberOfListeners('protocolError')).toEqual(0);
  });

  test('adding the same handler twice registers it once', () => {
    const dispatcher = new EventDispatcher();

    const handler = vitest.fn();
    dispatcher.addEventListener('serverStatus', handler);
    dispatcher.addEventListener('serverStatus', handler);

    expect(dispatcher.numberOfListeners('serverStatus')).toEqual(1);
    dispatcher.dispatchEvent('serverStatus', { status: 'listening' });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  test('does not notify handlers added while notifying another handler', () => {
    const dispatcher = new EventDispatcher();

    const handler1 = vitest.fn();
    const handler2 = vitest.fn(() => {
      dispatcher.addEventListener('probeEcho', handler1);
    });

    dispatcher.addEventListener('probeEcho', handler2);

    dispatcher.dispatchEvent('probeEcho', dummyEcho(1n));
    expect(handler1).toHaveBeenCalledTimes(0);
    expect(handler2).toHaveBeenCalledTimes(1);

    dispatcher.dispatchEvent('probeEcho', dummyEcho(2n));
    expect(handler1).toHaveBeenCalledTimes(1);
    expect(handler1).toHaveBeenCalledWith(dummyEcho(2n));
    expect(handler2).toHaveBeenCalledTimes(2);
  });

  test('does notify handlers removed while notifying another handler', () => {
    const dispatcher = new EventDispatcher();

    const handler2 = vitest.fn();
    const handler1 = vitest.fn(() => {
      dispatcher.removeEventListener('probeEcho', handler2);
    });

    dispatcher.addEventListener('probeEcho', handler1);
    dispatcher.addEventListener('probeEcho', handler2);

    dispatcher.dispatchEvent('probeEcho', dummyEcho());
    expect(handler1).toHaveBeenCalledTimes(1);
    expect(handler2).toHaveBeenCalledTimes(1);

    dispatcher.dispatchEvent('probeEcho', dummyEcho());
    expect(handler1).toHaveBeenCalledTimes(2);
    expect(handler2).toHaveBeenCalledTimes(1);
  });

  test('removes all listeners', () => {
    const dispatcher = new EventDispatcher();

    const handler = vitest.fn();
    dispatcher.addEventListener('probeEcho', handler);
    dispatcher.addEventListener('protocolError', handler);
    dispatcher.addEventListener('serverStatus', handler);
    dispatcher.addEventListener('handshake', handler);

    dispatcher.removeAllListeners();
    expect(dispatcher.numberOfListeners('probeEcho')).toEqual(0);
    expect(dispatcher.numberOfListeners('protocolError')).toEqual(0);
    expect(dispatcher.numberOfListeners('serverStatus')).toEqual(0);
    expect(dispatcher.numberOfListeners('handshake')).toEqual(0);

    dispatcher.dispatchEvent('probeEcho', dummyEcho());
    dispatcher.dispatchEvent('serverStatus', { status: 'closed' });
    expect(handler).toHaveBeenCalledTimes(0);
  });
});
