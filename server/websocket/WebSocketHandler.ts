/**
 * WebSocketHandler - SCPI lines over WebSocket text messages
 *
 * - A message may carry several '\n'-separated commands; they run in order
 * - Each non-null response goes back as its own text message, without the newline
 * - Messages of one client are serialized, same as lines of a TCP connection
 */

import type { RawData, WebSocket, WebSocketServer } from 'ws';
import { createCommandQueue, executeLine, type CommandQueue, type LineTarget } from '../transports/line-target.js';

export interface WebSocketHandler {
  getClientCount(): number;
  close(): void;
}

interface ClientState {
  id: string;
  ws: WebSocket;
  queue: CommandQueue;
}

let clientIdCounter = 0;

function generateClientId(): string {
  return `client-${++clientIdCounter}-${Date.now()}`;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function createWebSocketHandler(wss: WebSocketServer, target: LineTarget): WebSocketHandler {
  const clients = new Map<WebSocket, ClientState>();

  // Send a response to a specific client
  function send(ws: WebSocket, response: string): void {
    if (ws.readyState === 1) { // OPEN
      ws.send(response);
    }
  }

  function handleMessage(clientState: ClientState, text: string): void {
    for (const line of text.split('\n')) {
      clientState.queue
        .run(async () => {
          const response = await executeLine(target, line);
          if (response !== null) send(clientState.ws, response);
        })
        .catch(err => {
          console.error(`[WebSocket] Command failed for ${clientState.id}:`, err);
        });
    }
  }

  function handleDisconnect(ws: WebSocket): void {
    clients.delete(ws);
  }

  wss.on('connection', (ws: WebSocket) => {
    const clientState: ClientState = {
      id: generateClientId(),
      ws,
      queue: createCommandQueue(),
    };
    clients.set(ws, clientState);

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        console.warn(`[WebSocket] Ignoring binary message from ${clientState.id}`);
        return;
      }
      handleMessage(clientState, rawDataToString(data));
    });

    ws.on('close', () => {
      handleDisconnect(ws);
    });

    ws.on('error', (err) => {
      console.error('[WebSocket] Client error:', err);
      handleDisconnect(ws);
    });
  });

  function getClientCount(): number {
    return clients.size;
  }

  function close(): void {
    for (const ws of clients.keys()) {
      ws.terminate();
    }
    clients.clear();
  }

  return {
    getClientCount,
    close,
  };
}
