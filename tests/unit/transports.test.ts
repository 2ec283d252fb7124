import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StreamTransport } from '../../src/transports/stream.js';
import { DatagramTransport } from '../../src/transports/datagram.js';
import { createTransport } from '../../src/transports/index.js';
import { TransportError, TransportErrorType } from '../../src/errors.js';
import { TransportKind } from '../../src/types.js';
import {
  startStreamServer,
  startDatagramServer,
  closedStreamPort
} from '../helpers/servers.js';
import type { TestServer } from '../helpers/servers.js';

describe('createTransport', () => {
  it('should pick the variant for the kind', () => {
    expect(createTransport(TransportKind.STREAM)).toBeInstanceOf(StreamTransport);
    expect(createTransport(TransportKind.DATAGRAM, { receiveTimeout: 10 })).toBeInstanceOf(DatagramTransport);
  });
});

describe('StreamTransport', () => {
  let server: TestServer;
  let transport: StreamTransport;

  beforeEach(async () => {
    server = await startStreamServer();
    transport = new StreamTransport();
  });

  afterEach(async () => {
    transport.close();
    await server.close();
  });

  it('should exchange one request and one response', async () => {
    await transport.connect('127.0.0.1', server.port);

    expect(await transport.send('hello')).toBe(6);
    expect(await transport.receive()).toBe('HELLO\n');
    expect(server.received).toEqual(['hello']);
  });

  it('should keep a second buffered line for the next receive', async () => {
    await transport.connect('127.0.0.1', server.port);
    await transport.send('PAIR');

    expect(await transport.receive()).toBe('FIRST\n');
    expect(await transport.receive()).toBe('SECOND\n');
  });

  it('should return empty once the server closes', async () => {
    await transport.connect('127.0.0.1', server.port);
    await transport.send('QUIT');

    expect(await transport.receive()).toBe('');
    expect(transport.getEndReason()).toBe('Connection closed by server');
  });

  it('should exchange the farewell on disconnect', async () => {
    await transport.connect('127.0.0.1', server.port);

    expect(await transport.disconnect()).toBe('BYE\n');
    await expect(transport.send('late')).rejects.toThrow('Not connected to server');
    expect(server.received).toEqual(['BYE']);
  });

  it('should still close when the farewell cannot be sent', async () => {
    await transport.connect('127.0.0.1', server.port);
    await transport.send('QUIT');
    await transport.receive();

    const status = await transport.disconnect();

    expect(status).toBe(
      'Connection closed without farewell: Failed to send request: connection closed by server\n'
    );
    await expect(transport.send('late')).rejects.toThrow('Not connected to server');
  });

  it('should reject a refused connection', async () => {
    const port = await closedStreamPort();

    const error = await transport.connect('127.0.0.1', port).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ type: TransportErrorType.ConnectFailed });
    expect(String(error)).toContain(`Failed to connect to 127.0.0.1:${port}: connect ECONNREFUSED`);
  });

  it('should reject requests before connect', async () => {
    await expect(transport.send('hello')).rejects.toThrow('Not connected to server');
    await expect(transport.receive()).rejects.toThrow('Not connected to server');
  });

  it('should tolerate repeated close', async () => {
    await transport.connect('127.0.0.1', server.port);
    transport.close();
    transport.close();

    await expect(transport.send('late')).rejects.toThrow('Not connected to server');
  });
});

describe('DatagramTransport', () => {
  let server: TestServer;
  let transport: DatagramTransport;

  beforeEach(async () => {
    server = await startDatagramServer();
    transport = new DatagramTransport({ receiveTimeout: 2000 });
  });

  afterEach(async () => {
    transport.close();
    await server.close();
  });

  it('should exchange one request and one response', async () => {
    await transport.connect('127.0.0.1', server.port);

    expect(await transport.send('hello')).toBe(7);
    expect(await transport.receive()).toBe('OK:HELLO\n');
    expect(server.received).toEqual(['hello']);
  });

  it('should render an error status', async () => {
    await transport.connect('127.0.0.1', server.port);
    await transport.send('fail');

    expect(await transport.receive()).toBe('ERR:bad\n');
  });

  it('should reject an oversized request before writing', async () => {
    await transport.connect('127.0.0.1', server.port);

    await expect(transport.send('x'.repeat(300))).rejects.toThrow('Request too long: 300 bytes (max 255)');
    expect(server.received).toEqual([]);
  });

  it('should return empty for a zero-length datagram', async () => {
    await transport.connect('127.0.0.1', server.port);
    await transport.send('empty');

    expect(await transport.receive()).toBe('');
    expect(transport.getEndReason()).toBe('Empty response from server');
  });

  it('should return empty when the receive times out', async () => {
    const quick = new DatagramTransport({ receiveTimeout: 50 });
    await quick.connect('127.0.0.1', server.port);
    await quick.send('silent');

    expect(await quick.receive()).toBe('');
    expect(quick.getEndReason()).toBe('No response from server within 50 ms');
    quick.close();
  });

  it('should disconnect without a farewell', async () => {
    await transport.connect('127.0.0.1', server.port);

    expect(await transport.disconnect()).toBe('Disconnected\n');
    await expect(transport.send('late')).rejects.toThrow('Not connected to server');
    expect(server.received).toEqual([]);
  });

  it('should tolerate repeated close', async () => {
    await transport.connect('127.0.0.1', server.port);
    transport.close();
    transport.close();

    await expect(transport.send('late')).rejects.toThrow('Not connected to server');
  });
});
