// Shared types for the server and its HTTP/WebSocket clients

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (command handler invocation, sockets, process edges).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Result utilities for ergonomic chaining
export const Result = {
  /** Transform the success value */
  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Ok(fn(result.value)) : result;
  },
};

// ============ Instrument Types ============

/** Instrument personalities the server can host */
export type PersonalityName = 'function-generator' | 'power-supply';

export interface InstrumentStatus {
  identity: string;
  personality: PersonalityName;
  esr: number;
  sre: number;
  stb: number;
  errorCount: number;
}

// ============ HTTP API Types ============

export interface HealthResponse {
  status: 'ok';
  instrument: string;
  tcpClients: number;
  wsClients: number;
}

export interface CommandResponse {
  command: string;
  response: string | null;
}

export interface ApiError {
  error: string;
  message: string;
}
