/**
 * Power Supply
 * Single-output bench PSU personality
 *
 * Command set:
 * - [SOURce:]VOLTage[:LEVel][:IMMediate] <v|MIN|MAX|DEF> / ? [MIN|MAX|DEF]  - Voltage setpoint
 * - [SOURce:]CURRent[:LEVel][:IMMediate] <a|MIN|MAX|DEF> / ? [MIN|MAX|DEF]  - Current limit
 * - OUTPut[:STATe] ON|OFF / ?            - Output enable
 * - MEASure[:SCALar]:VOLTage[:DC]?       - Output voltage
 * - MEASure[:SCALar]:CURRent[:DC]?       - Output current
 * - APPLy <v>[,<a>] / APPLy?
 *
 * With a load resistance configured, the output follows Ohm's law and
 * drops into constant-current mode when the limit is reached.
 */

import { Ok } from '../../shared/types.js';
import {
  ScpiParams,
  createCommandRegistry,
  createInstrumentSession,
  createStatusModel,
  registerCommonCommands,
  SCPI_INSTRUMENT,
  type InstrumentSession,
  type InstrumentType,
  type NumericLimits,
  type ScpiInstrument,
} from '../scpi/index.js';

export interface PowerSupply extends ScpiInstrument {
  voltageSetpoint: number;
  currentLimit: number;
  outputEnabled: boolean;
  /** Attached load in ohms; null when nothing is connected */
  loadOhms: number | null;
  measureVoltage(): number;
  measureCurrent(): number;
  resetDeviceState(): void;
}

export interface PowerSupplyOptions {
  identity?: string;
  loadOhms?: number | null;
  errorQueueSize?: number;
}

export const POWER_SUPPLY = 'PowerSupply';

export const POWER_SUPPLY_TYPE: InstrumentType = {
  name: POWER_SUPPLY,
  parents: [SCPI_INSTRUMENT],
};

export const DEFAULT_POWER_SUPPLY_IDENTITY = 'SCPI BENCH,PS80,0,1.0';

export const VOLTAGE_LIMITS: NumericLimits = { min: 0, max: 80, default: 0 };
export const CURRENT_LIMITS: NumericLimits = { min: 0, max: 10, default: 10 };

const formatVolts = (value: number) => value.toFixed(3);
const formatAmps = (value: number) => value.toFixed(4);

export function createPowerSupply(options: PowerSupplyOptions = {}): PowerSupply {
  const { identity = DEFAULT_POWER_SUPPLY_IDENTITY, loadOhms = null, errorQueueSize } = options;

  return {
    identity,
    status: createStatusModel({ errorQueueSize }),
    voltageSetpoint: 0,
    currentLimit: 10,
    outputEnabled: false,
    loadOhms,

    measureVoltage(): number {
      if (!this.outputEnabled) return 0;
      if (this.loadOhms === null) return this.voltageSetpoint;
      // Constant-current mode once the load would draw more than the limit
      return Math.min(this.voltageSetpoint, this.currentLimit * this.loadOhms);
    },

    measureCurrent(): number {
      if (!this.outputEnabled || this.loadOhms === null) return 0;
      // Short circuit: the supply sits at its current limit
      if (this.loadOhms === 0) return this.voltageSetpoint > 0 ? this.currentLimit : 0;
      return Math.min(this.voltageSetpoint / this.loadOhms, this.currentLimit);
    },

    resetDeviceState(): void {
      this.voltageSetpoint = 0;
      this.currentLimit = 10;
      this.outputEnabled = false;
    },
  };
}

const SOURCE = String.raw`^(?:SOUR(?:ce)?:)?`;
const VOLTAGE = String.raw`VOLT(?:age)?(?::LEV(?:el)?)?(?::IMM(?:ediate)?)?`;
const CURRENT = String.raw`CURR(?:ent)?(?::LEV(?:el)?)?(?::IMM(?:ediate)?)?`;
const MEASURE = String.raw`^MEAS(?:ure)?(?::SCAL(?:ar)?)?:`;

export const POWER_SUPPLY_COMMANDS = createCommandRegistry<PowerSupply>();

function registerPowerSupplyCommands(): void {
  const registry = POWER_SUPPLY_COMMANDS;
  const owner = POWER_SUPPLY;

  registerCommonCommands(registry);

  registry.register(owner, 'voltage', SOURCE + VOLTAGE + String.raw`\s+(\S+)$`, (psu, token) => {
    const value = ScpiParams.parseFloat(token, VOLTAGE_LIMITS);
    if (!value.ok) return value;
    psu.voltageSetpoint = value.value;
    return Ok(null);
  });

  registry.register(owner, 'voltageQuery', SOURCE + VOLTAGE + String.raw`\?(?:\s+(\S+))?$`, (psu, meta) =>
    ScpiParams.formatQuery(meta, VOLTAGE_LIMITS, psu.voltageSetpoint, formatVolts)
  );

  registry.register(owner, 'current', SOURCE + CURRENT + String.raw`\s+(\S+)$`, (psu, token) => {
    const value = ScpiParams.parseFloat(token, CURRENT_LIMITS);
    if (!value.ok) return value;
    psu.currentLimit = value.value;
    return Ok(null);
  });

  registry.register(owner, 'currentQuery', SOURCE + CURRENT + String.raw`\?(?:\s+(\S+))?$`, (psu, meta) =>
    ScpiParams.formatQuery(meta, CURRENT_LIMITS, psu.currentLimit, formatVolts)
  );

  registry.register(owner, 'output', /^OUTP(?:ut)?(?::STAT(?:e)?)?\s+(\S+)$/, (psu, token) => {
    const enabled = ScpiParams.parseBool(token);
    if (!enabled.ok) return enabled;
    psu.outputEnabled = enabled.value;
    return Ok(null);
  });

  registry.register(owner, 'outputQuery', /^OUTP(?:ut)?(?::STAT(?:e)?)?\?$/, psu =>
    Ok(psu.outputEnabled ? '1' : '0')
  );

  registry.register(owner, 'measureVoltage', MEASURE + String.raw`VOLT(?:age)?(?::DC)?\?$`, psu =>
    Ok(formatVolts(psu.measureVoltage()))
  );

  registry.register(owner, 'measureCurrent', MEASURE + String.raw`CURR(?:ent)?(?::DC)?\?$`, psu =>
    Ok(formatAmps(psu.measureCurrent()))
  );

  // Voltage is applied before the current limit is validated
  registry.register(owner, 'apply', /^APPL(?:y)?\s+([^,\s]+)(?:\s*,\s*(\S+))?$/, (psu, voltageToken, currentToken) => {
    const voltage = ScpiParams.parseFloat(voltageToken, VOLTAGE_LIMITS);
    if (!voltage.ok) return voltage;
    psu.voltageSetpoint = voltage.value;

    if (currentToken === '') return Ok(null);
    const current = ScpiParams.parseFloat(currentToken, CURRENT_LIMITS);
    if (!current.ok) return current;
    psu.currentLimit = current.value;
    return Ok(null);
  });

  registry.register(owner, 'applyQuery', /^APPL(?:y)?\?$/, psu =>
    Ok(`${formatVolts(psu.voltageSetpoint)},${formatVolts(psu.currentLimit)}`)
  );
}

registerPowerSupplyCommands();

export function createPowerSupplySession(options: PowerSupplyOptions = {}): InstrumentSession<PowerSupply> {
  return createInstrumentSession(createPowerSupply(options), POWER_SUPPLY_TYPE, POWER_SUPPLY_COMMANDS);
}
