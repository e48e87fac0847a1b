/**
 * SCPI core module exports
 */

export { ScpiError } from './errors.js';

export {
  createStatusModel,
  esrBitForCode,
  formatErrorEntry,
  ESR_OPC,
  ESR_QUERY_ERROR,
  ESR_DEVICE_ERROR,
  ESR_EXECUTION_ERROR,
  ESR_COMMAND_ERROR,
  STB_ESB,
} from './status.js';
export type { StatusModel, StatusModelOptions, ErrorEntry } from './status.js';

export { createCommandRegistry, qualifiedKey } from './registry.js';
export type { CommandRegistry, CommandDefinition, RegisterOptions } from './registry.js';

export { registerCommonCommands, SCPI_INSTRUMENT, SCPI_INSTRUMENT_TYPE } from './common-commands.js';

export { handleCommand, createInstrumentSession } from './dispatcher.js';
export type { InstrumentSession } from './dispatcher.js';

export { ScpiParams, matchesMnemonic } from './params.js';
export type { NumericLimits, IntegerLimits, MetaValue } from './params.js';

export type {
  ScpiInstrument,
  InstrumentType,
  CommandResult,
  CommandHandler,
  ResolvedCommand,
} from './types.js';
