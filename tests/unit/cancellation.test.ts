import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { CancellationSignal } from '../../src/cancellation.js';
import { LineReader } from '../../src/line-reader.js';

describe('CancellationSignal', () => {
  it('should start clear and latch once cancelled', () => {
    const cancellation = new CancellationSignal();
    expect(cancellation.cancelled).toBe(false);

    cancellation.cancel();
    cancellation.cancel();

    expect(cancellation.cancelled).toBe(true);
    expect(cancellation.signal.aborted).toBe(true);
  });

  it('should fire the abort event exactly once', () => {
    const cancellation = new CancellationSignal();
    const onAbort = vi.fn();
    cancellation.signal.addEventListener('abort', onAbort);

    cancellation.cancel();
    cancellation.cancel();

    expect(onAbort).toHaveBeenCalledTimes(1);
  });

  it('should cancel on SIGINT until unbound', () => {
    const signals = new EventEmitter();
    const cancellation = new CancellationSignal();
    const unbind = cancellation.bindToProcess(signals);

    expect(signals.listenerCount('SIGINT')).toBe(1);
    signals.emit('SIGINT');
    expect(cancellation.cancelled).toBe(true);

    unbind();
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });

  it('should ignore SIGINT after unbinding', () => {
    const signals = new EventEmitter();
    const cancellation = new CancellationSignal();
    cancellation.bindToProcess(signals)();

    signals.emit('SIGINT');
    expect(cancellation.cancelled).toBe(false);
  });
});

describe('LineReader', () => {
  it('should yield lines without terminators, then null', async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);
    input.end('one\r\n\ntwo\n');

    expect(await reader.read()).toBe('one');
    expect(await reader.read()).toBe('');
    expect(await reader.read()).toBe('two');
    expect(await reader.read()).toBeNull();
    expect(reader.ended).toBe(true);
  });

  it('should wait for a line that arrives later', async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);
    const pending = reader.read();

    input.write('late\n');

    expect(await pending).toBe('late');
    expect(reader.ended).toBe(false);
    reader.close();
  });

  it('should resolve null when aborted while waiting', async () => {
    const input = new PassThrough();
    const reader = new LineReader(input);
    const controller = new AbortController();
    const pending = reader.read(controller.signal);

    controller.abort();

    expect(await pending).toBeNull();
    expect(reader.ended).toBe(false);
    reader.close();
  });
});
