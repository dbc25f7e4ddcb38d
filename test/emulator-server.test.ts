import { afterEach, describe, expect, it, vi } from 'vitest';
import { ServerAlreadyListeningError } from '../src/errors.js';
import { EmulatorServer } from '../src/server/emulator-server.js';
import type { EmulatorServerOptions } from '../src/types/emulator-types.js';
import { bundledDefinition } from './helpers/definitions.js';
import { LineClient } from './helpers/line-client.js';

describe('EmulatorServer', () => {
  const definition = bundledDefinition('mcintosh/mx160');
  const servers: EmulatorServer[] = [];
  const clients: LineClient[] = [];

  async function start(options: EmulatorServerOptions = {}): Promise<{ server: EmulatorServer; port: number }> {
    const server = new EmulatorServer(definition, options);
    servers.push(server);
    const address = await server.listen(0, '127.0.0.1');
    return { server, port: address.port };
  }

  async function connect(port: number): Promise<LineClient> {
    const client = await LineClient.connect(port);
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    await Promise.all(clients.splice(0).map(client => client.close()));
    await Promise.all(servers.splice(0).map(server => server.close()));
  });

  it('binds an ephemeral port and refuses to listen twice', async () => {
    const { server, port } = await start();
    expect(port).toBeGreaterThan(0);
    expect(server.listening).toBe(true);
    await expect(server.listen(0, '127.0.0.1')).rejects.toThrow(ServerAlreadyListeningError);
  });

  it('answers commands in order on one connection', async () => {
    const { port } = await start();
    const client = await connect(port);

    client.send('!POWER?\r');
    expect(await client.nextLine()).toBe('!POWER(0)');

    client.send('!POWER(1)\r!POWER?\r!VOL(-25)\r!VOL?\r');
    expect(await client.nextLine()).toBe('!POWER(1)');
    expect(await client.nextLine()).toBe('!POWER(1)');
    expect(await client.nextLine()).toBe('!VOL(-25)');
    expect(await client.nextLine()).toBe('!VOL(-25)');
  });

  it('terminates responses with the definition line ending', async () => {
    const { port } = await start();
    const client = await LineClient.connect(port);
    clients.push(client);
    const raw: string[] = [];
    const socketData = new Promise<void>(resolve => {
      client.onRaw(text => {
        raw.push(text);
        if (raw.join('').endsWith('\r\n')) resolve();
      });
    });
    client.send('!MUTE?\n');
    await socketData;
    expect(raw.join('')).toBe('!MUTE(0)\r\n');
  });

  it('reports rejected and unknown commands', async () => {
    const { server, port } = await start();
    const client = await connect(port);

    client.send('!VOL(999)\r!FOOBAR\r');
    expect(await client.nextLine()).toBe('!ERROR');
    expect(await client.nextLine()).toBe('!ERROR');
    expect(server.store.read('volume')).toBe(-40);
    expect(server.monitor.stats()).toEqual({ commands: 2, connections: 1, errors: 2 });
  });

  it('shares state between connections', async () => {
    const { server, port } = await start();
    const a = await connect(port);
    const b = await connect(port);

    a.send('!VOL(-12)\r');
    expect(await a.nextLine()).toBe('!VOL(-12)');
    b.send('!VOL?\r');
    expect(await b.nextLine()).toBe('!VOL(-12)');
    expect(server.snapshot().state['volume']).toBe(-12);
  });

  it('keeps other sessions running when one disconnects', async () => {
    const { server, port } = await start();
    const a = await connect(port);
    const b = await connect(port);
    await vi.waitFor(() => expect(server.sessions.size).toBe(2));

    await a.close();
    await vi.waitFor(() => expect(server.sessions.size).toBe(1));

    b.send('!MUTE\r');
    expect(await b.nextLine()).toBe('!MUTE(1)');
    expect(server.monitor.clients()).toHaveLength(1);
  });

  it('drops over-long lines and keeps the connection', async () => {
    const { port } = await start({ maxLineLength: 16 });
    const client = await connect(port);

    client.send(`${'X'.repeat(40)}\r!POWER?\r`);
    expect(await client.nextLine()).toBe('!POWER(0)');
  });

  it('closes idle sessions', async () => {
    const { server, port } = await start({ idleTimeout: 50 });
    const client = await connect(port);
    await client.closed;
    await vi.waitFor(() => expect(server.sessions.size).toBe(0));
  });

  it('closes every session on close', async () => {
    const { server, port } = await start();
    const client = await connect(port);
    await vi.waitFor(() => expect(server.sessions.size).toBe(1));

    await server.close();
    await client.closed;
    expect(server.listening).toBe(false);
    expect(server.sessions.size).toBe(0);
  });

  it('rejects when the port is taken', async () => {
    const { port } = await start();
    const second = new EmulatorServer(definition);
    await expect(second.listen(port, '127.0.0.1')).rejects.toThrow(/EADDRINUSE/);
    expect(second.listening).toBe(false);
  });
});
