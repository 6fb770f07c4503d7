import { describe, test, expect, vi } from 'vitest';
import { flushIo } from '../testUtil';
import { framePipe, writeFrame } from './pipe';

describe('framePipe', () => {
  test('delivers each write as one frame, in order', async () => {
    const [a, b] = framePipe();
    const received: Array<Uint8Array> = [];
    b.on('data', (frame: Uint8Array) => received.push(frame));

    await writeFrame(a, Buffer.from('one'));
    await writeFrame(a, Buffer.from('two'));
    await writeFrame(a, Buffer.from('three'));
    await flushIo();

    expect(received).toEqual([
      Buffer.from('one'),
      Buffer.from('two'),
      Buffer.from('three'),
    ]);
  });

  test('carries frames in both directions', async () => {
    const [a, b] = framePipe();
    const atA = vi.fn();
    const atB = vi.fn();
    a.on('data', atA);
    b.on('data', atB);

    await writeFrame(a, Buffer.from('ping'));
    await writeFrame(b, Buffer.from('pong'));
    await flushIo();

    expect(atB).toHaveBeenCalledWith(Buffer.from('ping'));
    expect(atA).toHaveBeenCalledWith(Buffer.from('pong'));
  });

  test('stalls the writer once the reader buffer is full', async () => {
    const [a, b] = framePipe(2);

    await writeFrame(a, Buffer.from('first'));
    let secondAccepted = false;
    const second = writeFrame(a, Buffer.from('second')).then(() => {
      secondAccepted = true;
    });

    await flushIo();
    expect(secondAccepted).toBe(false);

    expect(b.read()).toEqual(Buffer.from('first'));
    await second;
    expect(secondAccepted).toBe(true);
    expect(b.read()).toEqual(Buffer.from('second'));
  });

  test('a stalled writer is released when the reader is destroyed', async () => {
    const [a, b] = framePipe(2);
    a.on('error', vi.fn());

    await writeFrame(a, Buffer.from('first'));
    const second = writeFrame(a, Buffer.from('second'));
    await flushIo();

    b.destroy();
    await expect(second).rejects.toThrow('pipe peer is closed');
  });

  test('destroying one end ends the other', async () => {
    const [a, b] = framePipe();
    const ended = new Promise<void>((resolve) => b.once('end', resolve));
    b.resume();

    a.destroy();
    await ended;
  });

  test('writes to a closed pipe reject', async () => {
    const [a, b] = framePipe();
    b.on('error', vi.fn());
    a.destroy();
    await flushIo();

    await expect(writeFrame(b, Buffer.from('late'))).rejects.toThrow();
  });
});
