/**
 * Function Generator
 * Multi-channel signal generator personality (channel configuration only)
 *
 * Command set (n = channel suffix, default 1):
 * - [SOURce[n]:]FUNCtion[:SHAPe] <shape> / ?        - SINusoid|SQUare|PULSe|RAMP|NOISe|DC
 * - [SOURce[n]:]FREQuency[:FIXed] <hz> / ? [MIN|MAX|DEF]
 * - [SOURce[n]:]PERiod <s> / ?
 * - [SOURce[n]:]VOLTage[:LEVel][:IMMediate][:AMPLitude] <fs> / ? [MIN|MAX|DEF]
 * - [SOURce[n]:]VOLTage:OFFSet <fs> / ? [MIN|MAX|DEF]
 * - [SOURce[n]:]PHASe[:ADJust] <deg> / ? [MIN|MAX|DEF]
 * - [SOURce[n]:]FUNCtion:SQUare|PULSe:DCYCle <pct> / ?
 * - [SOURce[n]:]FUNCtion:RAMP:SYMMetry <pct> / ?
 * - [SOURce[n]:]FUNCtion:PULSe:WIDTh <s> / ?
 * - [SOURce[n]:]APPLy:<shape> [<hz>[,<fs>[,<offset>]]] / APPLy?
 * - OUTPut[n][:STATe] ON|OFF / ?
 * - SYSTem:CHANnel:COUNt?
 *
 * Amplitude and offset are in full-scale units. Settings are applied in
 * order and are not rolled back when a later parameter fails.
 */

import { Ok, Err, type Result } from '../../shared/types.js';
import {
  ScpiError,
  ScpiParams,
  createCommandRegistry,
  createInstrumentSession,
  createStatusModel,
  registerCommonCommands,
  SCPI_INSTRUMENT,
  type CommandResult,
  type InstrumentSession,
  type InstrumentType,
  type NumericLimits,
  type ScpiInstrument,
} from '../scpi/index.js';

export type Waveform = 'sine' | 'square' | 'pulse' | 'ramp' | 'noise' | 'dc';

export interface ChannelConfig {
  waveform: Waveform;
  frequencyHz: number;
  amplitudeFs: number;
  dcOffsetFs: number;
  /** Duty cycle / ramp symmetry as a fraction of the period, 0..1 */
  asymmetry: number;
  phaseDeg: number;
  outputEnabled: boolean;
}

export interface FunctionGenerator extends ScpiInstrument {
  readonly sampleRate: number;
  readonly channels: ChannelConfig[];
  /** 1-based channel lookup; '' selects channel 1 */
  getChannel(suffix: string): Result<ChannelConfig, ScpiError>;
  resetDeviceState(): void;
}

export interface FunctionGeneratorOptions {
  identity?: string;
  /** Number of output channels (default: 2) */
  channels?: number;
  /** Sample rate in Hz; frequency is limited to half of it (default: 48000) */
  sampleRate?: number;
  errorQueueSize?: number;
}

export const FUNCTION_GENERATOR = 'FunctionGenerator';

export const FUNCTION_GENERATOR_TYPE: InstrumentType = {
  name: FUNCTION_GENERATOR,
  parents: [SCPI_INSTRUMENT],
};

export const DEFAULT_FUNCTION_GENERATOR_IDENTITY = 'SCPI BENCH,FG2,0,1.0';

const WAVEFORMS: ReadonlyArray<readonly [string, Waveform]> = [
  ['SINusoid', 'sine'],
  ['SQUare', 'square'],
  ['PULSe', 'pulse'],
  ['RAMP', 'ramp'],
  ['NOISe', 'noise'],
  ['DC', 'dc'],
];

const WAVEFORM_SCPI: Record<Waveform, string> = {
  sine: 'SIN',
  square: 'SQU',
  pulse: 'PULS',
  ramp: 'RAMP',
  noise: 'NOIS',
  dc: 'DC',
};

const MIN_FREQUENCY_HZ = 0.001;
const AMPLITUDE_LIMITS: NumericLimits = { min: 0, max: 1, default: 1 };
const OFFSET_LIMITS: NumericLimits = { min: -1, max: 1, default: 0 };
const PHASE_LIMITS: NumericLimits = { min: -360, max: 360, default: 0 };
const PERCENT_LIMITS: NumericLimits = { min: 0, max: 100, default: 50 };

function frequencyLimits(fg: FunctionGenerator): NumericLimits {
  return { min: MIN_FREQUENCY_HZ, max: fg.sampleRate / 2, default: 1000 };
}

function periodLimits(fg: FunctionGenerator): NumericLimits {
  return { min: 2 / fg.sampleRate, max: 1 / MIN_FREQUENCY_HZ, default: 1 / 1000 };
}

export function defaultChannelConfig(): ChannelConfig {
  return {
    waveform: 'sine',
    frequencyHz: 1000,
    amplitudeFs: 1,
    dcOffsetFs: 0,
    asymmetry: 0.5,
    phaseDeg: 0,
    outputEnabled: false,
  };
}

export function createFunctionGenerator(options: FunctionGeneratorOptions = {}): FunctionGenerator {
  const {
    identity = DEFAULT_FUNCTION_GENERATOR_IDENTITY,
    channels: channelCount = 2,
    sampleRate = 48000,
    errorQueueSize,
  } = options;

  const channels = Array.from({ length: channelCount }, defaultChannelConfig);

  return {
    identity,
    sampleRate,
    channels,
    status: createStatusModel({ errorQueueSize }),

    getChannel(suffix: string): Result<ChannelConfig, ScpiError> {
      const index = suffix === '' ? 1 : Number.parseInt(suffix, 10);
      const channel = channels[index - 1];
      return channel ? Ok(channel) : Err(ScpiError.suffixOutOfRange());
    },

    resetDeviceState(): void {
      channels.splice(0, channels.length, ...Array.from({ length: channelCount }, defaultChannelConfig));
    },
  };
}

// ============ Command Handlers ============

type Setter = (fg: FunctionGenerator, channel: ChannelConfig, value: number) => Result<void, ScpiError>;

/** Parse a float for one channel and hand it to the setter */
function setNumber(limits: (fg: FunctionGenerator) => NumericLimits, apply: Setter) {
  return (fg: FunctionGenerator, suffix: string, token: string): CommandResult => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;

    const value = ScpiParams.parseFloat(token, limits(fg));
    if (!value.ok) return value;

    const applied = apply(fg, channel.value, value.value);
    return applied.ok ? Ok(null) : applied;
  };
}

/** Report a channel value, or one of its bounds when a meta-value follows the query */
function queryNumber(
  limits: (fg: FunctionGenerator) => NumericLimits,
  read: (channel: ChannelConfig) => number
) {
  return (fg: FunctionGenerator, suffix: string, meta: string): CommandResult => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    return ScpiParams.formatQuery(meta, limits(fg), read(channel.value));
  };
}

const setFrequency: Setter = (_fg, channel, value) => {
  channel.frequencyHz = value;
  return Ok(undefined);
};

const setAmplitude: Setter = (_fg, channel, value) => {
  channel.amplitudeFs = value;
  return Ok(undefined);
};

const setOffset: Setter = (_fg, channel, value) => {
  channel.dcOffsetFs = value;
  return Ok(undefined);
};

const setAsymmetryPercent: Setter = (_fg, channel, value) => {
  channel.asymmetry = value / 100;
  return Ok(undefined);
};

const setPulseWidth: Setter = (_fg, channel, seconds) => {
  const asymmetry = seconds * channel.frequencyHz;
  if (asymmetry > 1) {
    // Pulse would be longer than the period
    return Err(ScpiError.settingsConflict());
  }
  channel.asymmetry = asymmetry;
  return Ok(undefined);
};

function applyShape(fg: FunctionGenerator, suffix: string, shape: string, params: string): CommandResult {
  const channel = fg.getChannel(suffix);
  if (!channel.ok) return channel;

  const waveform = ScpiParams.parseEnum(shape, WAVEFORMS);
  if (!waveform.ok) return waveform;

  const values = params.trim() === '' ? [] : params.split(',').map(p => p.trim());
  if (values.length > 3) {
    return Err(ScpiError.parameterNotAllowed());
  }

  channel.value.waveform = waveform.value;

  const steps: Array<[NumericLimits, Setter]> = [
    [frequencyLimits(fg), setFrequency],
    [AMPLITUDE_LIMITS, setAmplitude],
    [OFFSET_LIMITS, setOffset],
  ];
  for (const [i, token] of values.entries()) {
    const [limits, apply] = steps[i];
    const value = ScpiParams.parseFloat(token, limits);
    if (!value.ok) return value;
    const applied = apply(fg, channel.value, value.value);
    if (!applied.ok) return applied;
  }
  return Ok(null);
}

// Optional SOURce[n]: prefix; group 1 is the channel suffix
const SOURCE = String.raw`^(?:SOUR(?:ce)?(\d*):)?`;
const QUERY_META = String.raw`\?(?:\s+(\S+))?$`;
const VALUE = String.raw`\s+(\S+)$`;

const FREQUENCY = String.raw`FREQ(?:uency)?(?::FIX(?:ed)?)?`;
const AMPLITUDE = String.raw`VOLT(?:age)?(?::LEV(?:el)?)?(?::IMM(?:ediate)?)?(?::AMPL(?:itude)?)?`;
const OFFSET = String.raw`VOLT(?:age)?:OFFS(?:et)?`;
const PHASE = String.raw`PHAS(?:e)?(?::ADJ(?:ust)?)?`;
const DUTY_CYCLE = String.raw`FUNC(?:tion)?:(?:SQU(?:are)?|PULS(?:e)?):DCYC(?:le)?`;
const SYMMETRY = String.raw`FUNC(?:tion)?:RAMP:SYMM(?:etry)?`;
const PULSE_WIDTH = String.raw`FUNC(?:tion)?:PULS(?:e)?:WIDT(?:h)?`;

export const FUNCTION_GENERATOR_COMMANDS = createCommandRegistry<FunctionGenerator>();

function registerFunctionGeneratorCommands(): void {
  const registry = FUNCTION_GENERATOR_COMMANDS;
  const owner = FUNCTION_GENERATOR;

  registerCommonCommands(registry);

  registry.register(owner, 'shape', SOURCE + String.raw`FUNC(?:tion)?(?::SHAP(?:e)?)?` + VALUE, (fg, suffix, token) => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    const waveform = ScpiParams.parseEnum(token, WAVEFORMS);
    if (!waveform.ok) return waveform;
    channel.value.waveform = waveform.value;
    return Ok(null);
  });

  registry.register(owner, 'shapeQuery', SOURCE + String.raw`FUNC(?:tion)?(?::SHAP(?:e)?)?\?$`, (fg, suffix) => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    return Ok(WAVEFORM_SCPI[channel.value.waveform]);
  });

  registry.register(owner, 'frequency', SOURCE + FREQUENCY + VALUE, setNumber(frequencyLimits, setFrequency));
  registry.register(owner, 'frequencyQuery', SOURCE + FREQUENCY + QUERY_META,
    queryNumber(frequencyLimits, c => c.frequencyHz));

  registry.register(owner, 'period', SOURCE + String.raw`PER(?:iod)?` + VALUE,
    setNumber(periodLimits, (_fg, channel, seconds) => {
      channel.frequencyHz = 1 / seconds;
      return Ok(undefined);
    }));
  registry.register(owner, 'periodQuery', SOURCE + String.raw`PER(?:iod)?` + QUERY_META,
    queryNumber(periodLimits, c => 1 / c.frequencyHz));

  registry.register(owner, 'offset', SOURCE + OFFSET + VALUE, setNumber(() => OFFSET_LIMITS, setOffset));
  registry.register(owner, 'offsetQuery', SOURCE + OFFSET + QUERY_META,
    queryNumber(() => OFFSET_LIMITS, c => c.dcOffsetFs));

  registry.register(owner, 'amplitude', SOURCE + AMPLITUDE + VALUE, setNumber(() => AMPLITUDE_LIMITS, setAmplitude));
  registry.register(owner, 'amplitudeQuery', SOURCE + AMPLITUDE + QUERY_META,
    queryNumber(() => AMPLITUDE_LIMITS, c => c.amplitudeFs));

  registry.register(owner, 'phase', SOURCE + PHASE + VALUE,
    setNumber(() => PHASE_LIMITS, (_fg, channel, degrees) => {
      channel.phaseDeg = degrees;
      return Ok(undefined);
    }));
  registry.register(owner, 'phaseQuery', SOURCE + PHASE + QUERY_META,
    queryNumber(() => PHASE_LIMITS, c => c.phaseDeg));

  registry.register(owner, 'dutyCycle', SOURCE + DUTY_CYCLE + VALUE, setNumber(() => PERCENT_LIMITS, setAsymmetryPercent));
  registry.register(owner, 'dutyCycle', SOURCE + SYMMETRY + VALUE, setNumber(() => PERCENT_LIMITS, setAsymmetryPercent));
  registry.register(owner, 'dutyCycleQuery', SOURCE + DUTY_CYCLE + QUERY_META,
    queryNumber(() => PERCENT_LIMITS, c => c.asymmetry * 100));
  registry.register(owner, 'dutyCycleQuery', SOURCE + SYMMETRY + QUERY_META,
    queryNumber(() => PERCENT_LIMITS, c => c.asymmetry * 100));

  registry.register(owner, 'pulseWidth', SOURCE + PULSE_WIDTH + VALUE, setNumber(() => ({ min: 0 }), setPulseWidth));
  registry.register(owner, 'pulseWidthQuery', SOURCE + PULSE_WIDTH + String.raw`\?$`, (fg, suffix) => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    return Ok(String(channel.value.asymmetry / channel.value.frequencyHz));
  });

  registry.register(owner, 'apply', SOURCE + String.raw`APPL(?:y)?:([A-Z]+)(?:\s+(.+))?$`, applyShape);
  registry.register(owner, 'applyQuery', SOURCE + String.raw`APPL(?:y)?\?$`, (fg, suffix) => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    const c = channel.value;
    return Ok(`${WAVEFORM_SCPI[c.waveform]} ${c.frequencyHz},${c.amplitudeFs},${c.dcOffsetFs}`);
  });

  registry.register(owner, 'output', String.raw`^OUTP(?:ut)?(\d*)(?::STAT(?:e)?)?\s+(\S+)$`, (fg, suffix, token) => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    const enabled = ScpiParams.parseBool(token);
    if (!enabled.ok) return enabled;
    channel.value.outputEnabled = enabled.value;
    return Ok(null);
  });

  registry.register(owner, 'outputQuery', String.raw`^OUTP(?:ut)?(\d*)(?::STAT(?:e)?)?\?$`, (fg, suffix) => {
    const channel = fg.getChannel(suffix);
    if (!channel.ok) return channel;
    return Ok(channel.value.outputEnabled ? '1' : '0');
  });

  registry.register(owner, 'channelCount', /^SYST(?:em)?:CHAN(?:nel)?:COUN(?:t)?\?$/, fg =>
    Ok(String(fg.channels.length))
  );
}

registerFunctionGeneratorCommands();

export function createFunctionGeneratorSession(
  options: FunctionGeneratorOptions = {}
): InstrumentSession<FunctionGenerator> {
  return createInstrumentSession(createFunctionGenerator(options), FUNCTION_GENERATOR_TYPE, FUNCTION_GENERATOR_COMMANDS);
}
