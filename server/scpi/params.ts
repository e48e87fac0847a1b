/**
 * SCPI Parameter Coercion
 *
 * Helpers for command handlers that accept numeric parameters. Wherever a
 * number is expected, SCPI also accepts the meta-values MINimum, MAXimum and
 * DEFault, which resolve to the parameter's configured bounds.
 */

import { Result, Ok, Err } from '../../shared/types.js';
import { ScpiError } from './errors.js';

export type MetaValue = 'min' | 'max' | 'default';

export interface NumericLimits {
  min?: number;
  max?: number;
  default?: number;
}

export interface IntegerLimits {
  min: number;
  max: number;
  default: number;
}

const META_VALUES: Partial<Record<string, MetaValue>> = {
  MIN: 'min',
  MINIMUM: 'min',
  MAX: 'max',
  MAXIMUM: 'max',
  DEF: 'default',
  DEFAULT: 'default',
};

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const BOOLEAN_VALUES: Partial<Record<string, boolean>> = {
  ON: true,
  '1': true,
  OFF: false,
  '0': false,
};

function resolveMeta(meta: MetaValue, limits: NumericLimits): Result<number, ScpiError> {
  const value = meta === 'min' ? limits.min : meta === 'max' ? limits.max : limits.default;
  return value === undefined ? Err(ScpiError.parameterNotAllowed()) : Ok(value);
}

function checkLimits(value: number, limits: NumericLimits): Result<number, ScpiError> {
  if (limits.min !== undefined && value < limits.min) return Err(ScpiError.outOfRange());
  if (limits.max !== undefined && value > limits.max) return Err(ScpiError.outOfRange());
  return Ok(value);
}

/**
 * Mnemonic match using the SCPI long/short convention: the uppercase prefix
 * of the mnemonic is the short form, the whole word the long form.
 * `matchesMnemonic('sin', 'SINusoid')` and `matchesMnemonic('SINUSOID', 'SINusoid')` hold.
 */
export function matchesMnemonic(token: string, mnemonic: string): boolean {
  const upper = token.trim().toUpperCase();
  const short = /^[A-Z0-9]*/.exec(mnemonic)?.[0] ?? '';
  return upper === mnemonic.toUpperCase() || upper === short;
}

export const ScpiParams = {
  /**
   * Recognize a meta-value token (case-insensitive).
   * @returns the meta-value, or null for anything else
   */
  parseMeta(token: string): MetaValue | null {
    return META_VALUES[token.trim().toUpperCase()] ?? null;
  },

  /**
   * Parse an integer parameter.
   *
   * Non-numeric input fails with -104 (command error); values outside
   * [min, max] fail with -222 (execution error) unless checkRange is false.
   */
  parseInt(token: string, limits: IntegerLimits, checkRange = true): Result<number, ScpiError> {
    const meta = this.parseMeta(token);
    if (meta) return resolveMeta(meta, limits);

    const trimmed = token.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      return Err(ScpiError.dataType());
    }

    const value = Number.parseInt(trimmed, 10);
    if (!Number.isFinite(value)) return Err(ScpiError.outOfRange());
    return checkRange ? checkLimits(value, limits) : Ok(value);
  },

  /**
   * Parse a floating point parameter.
   *
   * Any bound may be absent: the range check then skips it, and requesting
   * the matching meta-value fails with -108. A value that overflows the
   * double range is -222 even with the check off.
   */
  parseFloat(token: string, limits: NumericLimits = {}, checkRange = true): Result<number, ScpiError> {
    const meta = this.parseMeta(token);
    if (meta) return resolveMeta(meta, limits);

    const trimmed = token.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return Err(ScpiError.dataType());
    }

    const value = Number.parseFloat(trimmed);
    // Exponents past the double range overflow to Infinity
    if (!Number.isFinite(value)) return Err(ScpiError.outOfRange());
    return checkRange ? checkLimits(value, limits) : Ok(value);
  },

  /**
   * Build a query response. `FREQ? MAX` reports the bound without touching
   * state; a plain `FREQ?` reports the current value.
   *
   * @param metaToken - Optional MIN/MAX/DEF token following the query ('' means none)
   */
  formatQuery(
    metaToken: string | undefined,
    limits: NumericLimits,
    current: number,
    format: (value: number) => string = String
  ): Result<string, ScpiError> {
    if (metaToken === undefined || metaToken.trim() === '') {
      return Ok(format(current));
    }

    const meta = this.parseMeta(metaToken);
    if (!meta) return Err(ScpiError.illegalValue());

    return Result.map(resolveMeta(meta, limits), format);
  },

  /** Parse ON|OFF|1|0 */
  parseBool(token: string): Result<boolean, ScpiError> {
    const value = BOOLEAN_VALUES[token.trim().toUpperCase()];
    return value === undefined ? Err(ScpiError.illegalValue()) : Ok(value);
  },

  /**
   * Parse an enumerated parameter given as SCPI mnemonics.
   *
   * @param choices - Pairs of mnemonic (e.g. 'SINusoid') and the value it selects
   */
  parseEnum<T>(token: string, choices: ReadonlyArray<readonly [string, T]>): Result<T, ScpiError> {
    const match = choices.find(([mnemonic]) => matchesMnemonic(token, mnemonic));
    return match ? Ok(match[1]) : Err(ScpiError.illegalValue());
  },
};
