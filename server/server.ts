/**
 * SCPI Bench Server
 * Hosts one instrument personality over raw TCP, plus an optional
 * Express/WebSocket front end sharing the same session
 */

import { createServer, type Server } from 'http';
import type { AddressInfo } from 'net';
import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import type { HealthResponse, Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';
import type { ServerConfig } from './config.js';
import type { InstrumentSession } from './scpi/index.js';
import { createPersonalitySession } from './instruments/index.js';
import { createLineServer } from './transports/line-server.js';
import { createInstrumentRoutes } from './api/instrument.js';
import { createWebSocketHandler } from './websocket/WebSocketHandler.js';

export interface RunningServer {
  session: InstrumentSession;
  tcpAddress: AddressInfo;
  /** null when the HTTP front end is disabled */
  httpAddress: AddressInfo | null;
  close(): Promise<void>;
}

function listenHttp(server: Server, port: number, host: string): Promise<Result<AddressInfo, Error>> {
  return new Promise(resolve => {
    const onError = (err: Error) => resolve(Err(err));
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const bound = server.address();
      if (bound === null || typeof bound === 'string') {
        resolve(Err(new Error('HTTP server is not bound to a TCP address')));
        return;
      }
      resolve(Ok(bound));
    });
  });
}

export async function startServer(config: ServerConfig): Promise<Result<RunningServer, Error>> {
  const session = createPersonalitySession(config.instrument, {
    identity: config.identity,
    channels: config.channels,
    sampleRate: config.sampleRate,
    loadOhms: config.loadOhms,
    errorQueueSize: config.errorQueueSize,
  });

  const lineServer = createLineServer(session, { maxConnections: config.maxConnections });
  const tcp = await lineServer.listen(config.port, config.host);
  if (!tcp.ok) return tcp;

  if (!config.httpEnabled) {
    return Ok({
      session,
      tcpAddress: tcp.value,
      httpAddress: null,
      close: () => lineServer.close(),
    });
  }

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use('/api/instrument', createInstrumentRoutes(session, config.instrument));

  // Health check
  app.get('/api/health', (_req, res) => {
    const response: HealthResponse = {
      status: 'ok',
      instrument: session.instrument.identity,
      tcpClients: lineServer.getConnectionCount(),
      wsClients: wsHandler.getClientCount(),
    };
    res.json(response);
  });

  // Create HTTP server (needed for WebSocket)
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer, path: '/ws' });
  const wsHandler = createWebSocketHandler(wss, session);

  const http = await listenHttp(httpServer, config.httpPort, config.host);
  if (!http.ok) {
    wsHandler.close();
    wss.close();
    await lineServer.close();
    return http;
  }
  console.log(`[Server] HTTP API on http://${http.value.address}:${http.value.port}/api, WebSocket on /ws`);

  return Ok({
    session,
    tcpAddress: tcp.value,
    httpAddress: http.value,
    async close(): Promise<void> {
      wsHandler.close();
      wss.close();
      await new Promise<void>(resolve => {
        httpServer.close(() => resolve());
        httpServer.closeAllConnections();
      });
      await lineServer.close();
    },
  });
}
