import type { Result } from '../../shared/types.js';
import type { ScpiError } from './errors.js';
import type { StatusModel } from './status.js';

/**
 * Instrument-side contract shared by every personality.
 * Command handlers receive the instrument they are bound to.
 */
export interface ScpiInstrument {
  readonly identity: string;
  readonly status: StatusModel;
  /** Invoked by *RST after the status model is cleared */
  resetDeviceState?(): void;
}

/**
 * Static description of an instrument type. Commands registered under the
 * type's own name or one of its direct parents are visible to it.
 */
export interface InstrumentType {
  readonly name: string;
  readonly parents: readonly string[];
}

/** Ok(string) is a query response, Ok(null) an action with nothing to send back */
export type CommandResult = Result<string | null, ScpiError>;

export type CommandHandler<I> = (instrument: I, ...args: string[]) => CommandResult;

export interface ResolvedCommand<I> {
  /** Qualified key, `Owner.name` */
  readonly key: string;
  readonly pattern: RegExp;
  readonly handler: CommandHandler<I>;
}
