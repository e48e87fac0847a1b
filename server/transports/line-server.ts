/**
 * Line Server
 * Newline-framed SCPI over raw TCP (port 5025 by convention)
 *
 * - One handler per accepted connection; the accept path never waits on client I/O
 * - Framing splits on the '\n' byte before UTF-8 decoding, so multi-byte
 *   characters split across reads come out intact
 * - Lines of one connection run strictly in arrival order
 * - Non-null responses are written back followed by '\n'; actions send nothing
 * - A client that stops reading stalls its own connection: once the socket
 *   buffer is full, no further line runs until it drains
 * - An unterminated fragment left at EOF is discarded
 */

import { createServer, type AddressInfo, type Server, type Socket } from 'net';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { createCommandQueue, executeLine, type LineTarget } from './line-target.js';

export interface LineServerOptions {
  /** Refuse connections beyond this many (default: 0, unlimited) */
  maxConnections?: number;
  /** Name for logging */
  name?: string;
}

export interface LineServer {
  listen(port: number, host?: string): Promise<Result<AddressInfo, Error>>;
  close(): Promise<void>;
  getConnectionCount(): number;
  /** Bound address, or null before listen() succeeds */
  getAddress(): AddressInfo | null;
}

// Peer went away mid-read; not a server fault
const RESET_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNABORTED']);

function isResetError(err: Error): boolean {
  return 'code' in err && typeof err.code === 'string' && RESET_CODES.has(err.code);
}

export function createLineServer(target: LineTarget, options: LineServerOptions = {}): LineServer {
  const { maxConnections = 0, name = 'LineServer' } = options;

  const connections = new Set<Socket>();
  let address: AddressInfo | null = null;

  // Half-open sockets let queued responses go out after the client stops sending
  const server: Server = createServer({ allowHalfOpen: true }, handleConnection);

  function handleConnection(socket: Socket): void {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;

    if (maxConnections > 0 && connections.size >= maxConnections) {
      console.warn(`[${name}] Refusing ${peer}: ${maxConnections} connection(s) already open`);
      socket.destroy();
      return;
    }

    connections.add(socket);
    const queue = createCommandQueue();
    // Keep the delimiter so a fragment flushed at EOF can be told apart from a full line
    const lines = socket.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8', includeDelimiter: true }));

    function send(response: string): Promise<void> {
      if (socket.destroyed || !socket.writable) return Promise.resolve();
      if (socket.write(`${response}\n`)) return Promise.resolve();

      lines.pause();
      return new Promise(resolve => {
        const done = () => {
          socket.off('drain', done);
          socket.off('close', done);
          if (!socket.destroyed) lines.resume();
          resolve();
        };
        socket.on('drain', done);
        socket.on('close', done);
      });
    }

    lines.on('data', (line: string) => {
      if (!line.endsWith('\n')) return;

      queue
        .run(async () => {
          if (socket.destroyed) return;
          const response = await executeLine(target, line);
          if (response !== null) await send(response);
        })
        .catch(err => {
          console.error(`[${name}] Command failed for ${peer}:`, err);
        });
    });

    // EOF: finish what is queued, then close our side
    lines.on('end', () => {
      queue
        .run(async () => {
          socket.end();
        })
        .catch(err => {
          console.error(`[${name}] Failed to close ${peer}:`, err);
        });
    });

    socket.on('error', (err: Error) => {
      if (!isResetError(err)) {
        console.error(`[${name}] Socket error from ${peer}:`, err);
      }
    });

    socket.on('close', () => {
      connections.delete(socket);
      socket.unpipe(lines);
      lines.destroy();
    });
  }

  server.on('error', (err: Error) => {
    console.error(`[${name}] Server error:`, err);
  });

  return {
    listen(port: number, host?: string): Promise<Result<AddressInfo, Error>> {
      return new Promise(resolve => {
        const onError = (err: Error) => {
          server.off('listening', onListening);
          resolve(Err(err));
        };
        const onListening = () => {
          server.off('error', onError);
          const bound = server.address();
          if (bound === null || typeof bound === 'string') {
            resolve(Err(new Error(`${name} is not bound to a TCP address`)));
            return;
          }
          address = bound;
          console.log(`[${name}] Listening on ${bound.address}:${bound.port}`);
          resolve(Ok(bound));
        };

        server.once('error', onError);
        server.once('listening', onListening);
        server.listen(port, host);
      });
    },

    close(): Promise<void> {
      for (const socket of connections) {
        socket.destroy();
      }
      connections.clear();

      return new Promise(resolve => {
        if (!server.listening) {
          resolve();
          return;
        }
        server.close(() => {
          address = null;
          resolve();
        });
      });
    },

    getConnectionCount: () => connections.size,

    getAddress: () => address,
  };
}
