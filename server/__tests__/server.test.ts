import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DEFAULT_CONFIG, type ServerConfig } from '../config.js';
import { startServer, type RunningServer } from '../server.js';
import { connectLineClient, type LineClient } from '../transports/__tests__/line-client.js';
import { createTestClient } from '../websocket/__tests__/TestClient.js';

const TEST_CONFIG: ServerConfig = {
  ...DEFAULT_CONFIG,
  host: '127.0.0.1',
  port: 0,
  httpPort: 0,
};

describe('startServer', () => {
  let running: RunningServer | null = null;
  const clients: LineClient[] = [];

  async function start(overrides: Partial<ServerConfig> = {}): Promise<RunningServer> {
    const result = await startServer({ ...TEST_CONFIG, ...overrides });
    if (!result.ok) throw result.error;
    running = result.value;
    return result.value;
  }

  function apiUrl(server: RunningServer, path: string): string {
    if (!server.httpAddress) throw new Error('HTTP is disabled');
    return `http://127.0.0.1:${server.httpAddress.port}/api${path}`;
  }

  function postCommand(server: RunningServer, body: unknown): Promise<Response> {
    return fetch(apiUrl(server, '/instrument/command'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function openTcp(server: RunningServer): Promise<LineClient> {
    const client = await connectLineClient(server.tcpAddress.port);
    clients.push(client);
    return client;
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.socket.destroy();
    }
    if (running) {
      await running.close();
      running = null;
    }
    vi.restoreAllMocks();
  });

  describe('raw SCPI over TCP', () => {
    it('runs an identify, reset and error query session', async () => {
      const server = await start({ instrument: 'power-supply', identity: 'TEST,PSU,42,1.0' });
      const client = await openTcp(server);

      const text = await client.write('*IDN?\nVOLT 12\n*RST\nVOLT?\nNOPE\nSYST:ERR?\n').then(() => client.finish());

      expect(text).toBe('TEST,PSU,42,1.0\n0.000\n-113,"Undefined header"\n');
    });

    it('hosts the configured function generator', async () => {
      const server = await start({ channels: 4 });
      const client = await openTcp(server);

      await client.write('SYST:CHAN:COUN?\n');

      expect(await client.readLines(1)).toEqual(['4']);
    });

    it('skips HTTP when disabled', async () => {
      const server = await start({ httpEnabled: false });
      expect(server.httpAddress).toBeNull();

      const client = await openTcp(server);
      await client.write('*OPC?\n');
      expect(await client.readLines(1)).toEqual(['1']);
    });

    it('reports a port already in use', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const first = await start({ httpEnabled: false });

      const second = await startServer({ ...TEST_CONFIG, port: first.tcpAddress.port, httpEnabled: false });

      expect(second.ok).toBe(false);
    });
  });

  describe('HTTP API', () => {
    it('reports health', async () => {
      const server = await start();
      const client = await openTcp(server);
      // A round trip guarantees the server has accepted the connection
      await client.write('*OPC?\n');
      await client.readLines(1);

      const res = await fetch(apiUrl(server, '/health'));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        instrument: 'SCPI BENCH,FG2,0,1.0',
        tcpClients: 1,
        wsClients: 0,
      });
    });

    it('executes a query', async () => {
      const server = await start();

      const res = await postCommand(server, { command: '*IDN?' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ command: '*IDN?', response: 'SCPI BENCH,FG2,0,1.0' });
    });

    it('returns a null response for actions', async () => {
      const server = await start();

      const res = await postCommand(server, { command: '  FREQ 440  ' });

      expect(await res.json()).toEqual({ command: 'FREQ 440', response: null });
      expect(server.session.handleCommand('FREQ?')).toBe('440');
    });

    it('rejects a missing or blank command', async () => {
      const server = await start();
      const expected = { error: 'INVALID_COMMAND', message: 'Body must contain a non-empty "command" string' };

      for (const body of [{}, { command: '   ' }, { command: 42 }]) {
        const res = await postCommand(server, body);
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual(expected);
      }
    });

    it('reports status registers without clearing them', async () => {
      const server = await start();
      await postCommand(server, { command: '*SRE 32' });
      await postCommand(server, { command: 'BOGUS:COMMAND' });

      const expected = {
        identity: 'SCPI BENCH,FG2,0,1.0',
        personality: 'function-generator',
        esr: 32,
        sre: 32,
        stb: 32,
        errorCount: 1,
      };
      expect(await (await fetch(apiUrl(server, '/instrument'))).json()).toEqual(expected);
      expect(await (await fetch(apiUrl(server, '/instrument'))).json()).toEqual(expected);
    });

    it('lists resolved commands in match order', async () => {
      const server = await start({ instrument: 'power-supply' });

      const res = await fetch(apiUrl(server, '/instrument/commands'));
      const body: unknown = await res.json();

      expect(body).toEqual({ commands: server.session.getCommandKeys() });
      expect(server.session.getCommandKeys()[0]).toBe('ScpiInstrument.identity');
      expect(server.session.getCommandKeys()).toContain('PowerSupply.measureCurrent');
    });
  });

  describe('shared session', () => {
    it('sees TCP changes over HTTP', async () => {
      const server = await start({ instrument: 'power-supply' });
      const client = await openTcp(server);

      await client.write('VOLT 5\n*OPC?\n');
      await client.readLines(1);

      const res = await postCommand(server, { command: 'VOLT?' });
      expect(await res.json()).toEqual({ command: 'VOLT?', response: '5.000' });
    });

    it('serves the WebSocket bridge on /ws', async () => {
      const server = await start();
      if (!server.httpAddress) throw new Error('HTTP is disabled');
      const ws = createTestClient(`ws://127.0.0.1:${server.httpAddress.port}/ws`);
      await ws.connect();

      ws.send('FREQ 123\nFREQ?');
      expect(await ws.waitForMessages(1)).toEqual(['123']);

      const health = await fetch(apiUrl(server, '/health'));
      expect(await health.json()).toMatchObject({ wsClients: 1 });

      await ws.close();
    });
  });
});
