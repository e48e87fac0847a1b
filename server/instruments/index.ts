/**
 * Instrument Personalities
 * Creates the session for the personality a server should host
 *
 * Usage:
 *   const session = createPersonalitySession('function-generator', { channels: 4 });
 *   session.handleCommand('*IDN?');
 */

import type { PersonalityName } from '../../shared/types.js';
import type { InstrumentSession } from '../scpi/index.js';
import { createFunctionGeneratorSession } from './function-generator.js';
import { createPowerSupplySession } from './power-supply.js';

export const PERSONALITIES: readonly PersonalityName[] = ['function-generator', 'power-supply'];

export interface PersonalityOptions {
  /** *IDN? string; each personality has its own default */
  identity?: string;
  /** Function generator output channels */
  channels?: number;
  /** Function generator sample rate in Hz */
  sampleRate?: number;
  /** Power supply load resistance in ohms */
  loadOhms?: number | null;
  errorQueueSize?: number;
}

export function isPersonalityName(value: string): value is PersonalityName {
  return PERSONALITIES.some(p => p === value);
}

export function createPersonalitySession(
  personality: PersonalityName,
  options: PersonalityOptions = {}
): InstrumentSession {
  switch (personality) {
    case 'function-generator':
      return createFunctionGeneratorSession({
        identity: options.identity,
        channels: options.channels,
        sampleRate: options.sampleRate,
        errorQueueSize: options.errorQueueSize,
      });
    case 'power-supply':
      return createPowerSupplySession({
        identity: options.identity,
        loadOhms: options.loadOhms,
        errorQueueSize: options.errorQueueSize,
      });
  }
}

export type { FunctionGenerator, ChannelConfig, Waveform, FunctionGeneratorOptions } from './function-generator.js';
export type { PowerSupply, PowerSupplyOptions } from './power-supply.js';
export { createFunctionGeneratorSession, createPowerSupplySession };
