/**
 * WebSocket TestClient - text-message client for the SCPI bridge
 *
 * Provides utilities for:
 * - Connecting to the WebSocket server
 * - Sending raw command text
 * - Waiting for a number of response messages
 */

import WebSocket from 'ws';

export interface TestClient {
  connect(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;
  send(text: string): void;
  sendBinary(data: Buffer): void;
  getMessages(): string[];
  /** Resolves once `count` messages have arrived in total */
  waitForMessages(count: number, timeoutMs?: number): Promise<string[]>;
}

const DEFAULT_TIMEOUT = 2000;

export function createTestClient(url: string): TestClient {
  let ws: WebSocket | null = null;
  const messages: string[] = [];
  const listeners: Array<() => void> = [];

  function connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      ws = socket;

      socket.on('open', () => {
        resolve();
      });

      socket.on('error', (err) => {
        reject(err);
      });

      socket.on('message', (data, isBinary) => {
        if (isBinary) return;
        messages.push(data.toString());
        for (const listener of [...listeners]) {
          listener();
        }
      });
    });
  }

  function close(): Promise<void> {
    const socket = ws;
    ws = null;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      socket.once('close', () => resolve());
      socket.close();
    });
  }

  function isConnected(): boolean {
    return ws !== null && ws.readyState === WebSocket.OPEN;
  }

  function requireSocket(): WebSocket {
    if (ws === null || ws.readyState !== WebSocket.OPEN) {
      throw new Error('Not connected');
    }
    return ws;
  }

  function send(text: string): void {
    requireSocket().send(text);
  }

  function sendBinary(data: Buffer): void {
    requireSocket().send(data, { binary: true });
  }

  function getMessages(): string[] {
    return [...messages];
  }

  function waitForMessages(count: number, timeoutMs = DEFAULT_TIMEOUT): Promise<string[]> {
    return new Promise((resolve, reject) => {
      if (messages.length >= count) {
        resolve(messages.slice(0, count));
        return;
      }

      const timeout = setTimeout(() => {
        const idx = listeners.indexOf(listener);
        if (idx >= 0) listeners.splice(idx, 1);
        reject(new Error(`Timeout waiting for ${count} message(s), got ${JSON.stringify(messages)}`));
      }, timeoutMs);

      const listener = () => {
        if (messages.length >= count) {
          clearTimeout(timeout);
          const idx = listeners.indexOf(listener);
          if (idx >= 0) listeners.splice(idx, 1);
          resolve(messages.slice(0, count));
        }
      };

      listeners.push(listener);
    });
  }

  return {
    connect,
    close,
    isConnected,
    send,
    sendBinary,
    getMessages,
    waitForMessages,
  };
}
