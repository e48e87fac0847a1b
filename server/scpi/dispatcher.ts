/**
 * Command Dispatcher
 *
 * Routes one command line to the first resolved pattern that matches it.
 * A failing command never takes the session down: protocol faults and
 * unexpected exceptions alike end up in the error queue, and the caller
 * gets no response for that line.
 */

import type { CommandRegistry } from './registry.js';
import type { CommandResult, InstrumentType, ResolvedCommand, ScpiInstrument } from './types.js';
import { ScpiError } from './errors.js';

export interface InstrumentSession<I extends ScpiInstrument = ScpiInstrument> {
  readonly instrument: I;
  readonly type: InstrumentType;
  /** Qualified keys of the resolved commands, in match order */
  getCommandKeys(): string[];
  handleCommand(line: string): string | null;
}

/**
 * Dispatch one trimmed command line.
 *
 * @returns the handler's response, or null for actions, unknown headers and failed commands
 */
export function handleCommand<I extends ScpiInstrument>(
  instrument: I,
  commands: readonly ResolvedCommand<I>[],
  line: string
): string | null {
  for (const command of commands) {
    const match = command.pattern.exec(line);
    if (!match) continue;

    // Unmatched optional groups are passed as ''
    const args = match.slice(1).map(group => group ?? '');

    let result: CommandResult;
    try {
      result = command.handler(instrument, ...args);
    } catch (err) {
      // Internal detail stays in the log; the client only sees -300
      console.error(`[Dispatcher] ${command.key} failed on "${line}":`, err);
      const fault = ScpiError.deviceError();
      instrument.status.pushError(fault.code, fault.message);
      return null;
    }

    if (!result.ok) {
      instrument.status.pushError(result.error.code, result.error.message);
      return null;
    }
    return result.value;
  }

  const undefinedHeader = ScpiError.undefinedHeader();
  instrument.status.pushError(undefinedHeader.code, undefinedHeader.message);
  return null;
}

/**
 * Bind an instrument to the commands its type can see.
 * Resolution happens once, here; the registry is frozen afterwards.
 */
export function createInstrumentSession<I extends ScpiInstrument>(
  instrument: I,
  type: InstrumentType,
  registry: CommandRegistry<I>
): InstrumentSession<I> {
  const commands = registry.resolveFor(type);

  return {
    instrument,
    type,
    getCommandKeys: () => [...new Set(commands.map(c => c.key))],
    handleCommand: (line: string) => handleCommand(instrument, commands, line),
  };
}
