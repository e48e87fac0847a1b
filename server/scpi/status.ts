/**
 * IEEE-488.2 status model
 *
 * Event Status Register (ESR), Service Request Enable (SRE), Event Status
 * Enable (ESE) and the FIFO error queue read by SYSTem:ERRor?.
 */

import { ScpiError } from './errors.js';

export const ESR_OPC = 0x01;
export const ESR_QUERY_ERROR = 0x04;
export const ESR_DEVICE_ERROR = 0x08;
export const ESR_EXECUTION_ERROR = 0x10;
export const ESR_COMMAND_ERROR = 0x20;

/** Event summary bit of the status byte */
export const STB_ESB = 0x20;

/** 0 = unbounded */
export const DEFAULT_ERROR_QUEUE_SIZE = 0;

export interface ErrorEntry {
  code: number;
  message: string;
}

export interface StatusModelOptions {
  /** Maximum queued errors before the newest is replaced by -350 (default: 0 = unbounded; SCPI-99 instruments use 32) */
  errorQueueSize?: number;
}

export interface StatusModel {
  getEsr(): number;
  getSre(): number;
  getEse(): number;
  setEsrBits(bits: number): void;
  /** *ESR? semantics: returns the register and clears it */
  readEsr(): number;
  setSre(mask: number): void;
  setEse(mask: number): void;
  getStatusByte(): number;

  pushError(code: number, message: string): void;
  /** Oldest entry, or 0,"No error" when the queue is empty */
  popError(): ErrorEntry;
  getErrorCount(): number;
  getErrors(): ErrorEntry[];

  /** *CLS semantics: empties the error queue and zeroes ESR */
  clear(): void;
}

const NO_ERROR: ErrorEntry = { code: 0, message: 'No error' };

/**
 * ESR bit for an error code, by SCPI error class.
 * Codes outside the negative ranges fall back to the execution error bit.
 */
export function esrBitForCode(code: number): number {
  if (code <= -100 && code > -200) return ESR_COMMAND_ERROR;
  if (code <= -200 && code > -300) return ESR_EXECUTION_ERROR;
  if (code <= -300 && code > -400) return ESR_DEVICE_ERROR;
  if (code <= -400) return ESR_QUERY_ERROR;
  return ESR_EXECUTION_ERROR;
}

/** Format an error entry as a SYSTem:ERRor? response, doubling embedded quotes */
export function formatErrorEntry(entry: ErrorEntry): string {
  return `${entry.code},"${entry.message.replace(/"/g, '""')}"`;
}

export function createStatusModel(options: StatusModelOptions = {}): StatusModel {
  const { errorQueueSize = DEFAULT_ERROR_QUEUE_SIZE } = options;

  let esr = 0;
  let sre = 0;
  let ese = 0;
  const errors: ErrorEntry[] = [];

  function enqueue(entry: ErrorEntry): void {
    if (errorQueueSize <= 0 || errors.length < errorQueueSize) {
      errors.push(entry);
      return;
    }

    // Full: the last slot reports the overflow instead
    const overflow = ScpiError.queueOverflow();
    errors[errors.length - 1] = overflow;
    esr |= esrBitForCode(overflow.code);
  }

  return {
    getEsr: () => esr,
    getSre: () => sre,
    getEse: () => ese,

    setEsrBits(bits: number): void {
      esr = (esr | bits) & 0xff;
    },

    readEsr(): number {
      const value = esr;
      esr = 0;
      return value;
    },

    setSre(mask: number): void {
      sre = mask & 0xff;
    },

    setEse(mask: number): void {
      ese = mask & 0xff;
    },

    getStatusByte(): number {
      let stb = 0;
      if (esr & sre) {
        stb |= STB_ESB;
      }
      return stb;
    },

    pushError(code: number, message: string): void {
      enqueue({ code, message });
      esr |= esrBitForCode(code);
    },

    popError(): ErrorEntry {
      return errors.shift() ?? { ...NO_ERROR };
    },

    getErrorCount: () => errors.length,

    getErrors: () => errors.map(e => ({ ...e })),

    clear(): void {
      errors.length = 0;
      esr = 0;
    },
  };
}
