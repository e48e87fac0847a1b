import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Ok, Err } from '../../../shared/types.js';
import { createCommandRegistry } from '../registry.js';
import { createStatusModel } from '../status.js';
import { ScpiError } from '../errors.js';
import { createInstrumentSession, type InstrumentSession } from '../dispatcher.js';
import { registerCommonCommands, SCPI_INSTRUMENT } from '../common-commands.js';
import type { InstrumentType, ScpiInstrument } from '../types.js';

interface Counter extends ScpiInstrument {
  count: number;
  resetDeviceState(): void;
}

const COUNTER_TYPE: InstrumentType = { name: 'Counter', parents: [SCPI_INSTRUMENT] };

function createCounterSession(): InstrumentSession<Counter> {
  const registry = createCommandRegistry<Counter>();
  registerCommonCommands(registry);

  registry.register('Counter', 'countQuery', /^COUN(?:t)?\?$/, counter => Ok(String(counter.count)));
  registry.register('Counter', 'count', /^COUN(?:t)?\s+(\S+)(?:\s+(\S+))?$/, (counter, value, step) => {
    if (step !== '') return Err(ScpiError.parameterNotAllowed());
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) return Err(ScpiError.dataType());
    counter.count = parsed;
    return Ok(null);
  });
  registry.register('Counter', 'explode', /^EXPL(?:ode)?$/, () => {
    throw new Error('boom');
  });
  // Shadowed by countQuery, which is registered first
  registry.register('Counter', 'shadow', /^COUNT\?$/, () => Ok('shadow'));

  const counter: Counter = {
    identity: 'TEST,COUNTER,0,1.0',
    status: createStatusModel(),
    count: 0,
    resetDeviceState() {
      this.count = 0;
    },
  };

  return createInstrumentSession(counter, COUNTER_TYPE, registry);
}

describe('Dispatcher', () => {
  let session: InstrumentSession<Counter>;

  beforeEach(() => {
    session = createCounterSession();
  });

  describe('matching', () => {
    it('returns the handler response for queries', () => {
      expect(session.handleCommand('*IDN?')).toBe('TEST,COUNTER,0,1.0');
      expect(session.handleCommand('COUNT?')).toBe('0');
    });

    it('matches case-insensitively', () => {
      session.handleCommand('count 7');
      expect(session.handleCommand('coun?')).toBe('7');
      expect(session.handleCommand('*idn?')).toBe('TEST,COUNTER,0,1.0');
    });

    it('returns null for actions', () => {
      expect(session.handleCommand('COUNT 3')).toBeNull();
      expect(session.instrument.count).toBe(3);
      expect(session.instrument.status.getErrorCount()).toBe(0);
    });

    it('uses the first matching pattern', () => {
      expect(session.handleCommand('COUNT?')).toBe('0');
    });

    it('passes unmatched optional groups as empty strings', () => {
      session.handleCommand('COUNT 4 2');
      expect(session.instrument.count).toBe(0);
      expect(session.instrument.status.popError()).toEqual({ code: -108, message: 'Parameter not allowed' });
    });

    it('lists resolved keys in match order without duplicates', () => {
      expect(session.getCommandKeys()).toEqual([
        'ScpiInstrument.identity',
        'ScpiInstrument.operationComplete',
        'ScpiInstrument.wait',
        'ScpiInstrument.reset',
        'ScpiInstrument.clearStatus',
        'ScpiInstrument.eventStatusQuery',
        'ScpiInstrument.eventStatusEnable',
        'ScpiInstrument.eventStatusEnableQuery',
        'ScpiInstrument.serviceRequestEnable',
        'ScpiInstrument.serviceRequestEnableQuery',
        'ScpiInstrument.statusByte',
        'ScpiInstrument.selfTest',
        'ScpiInstrument.systemError',
        'ScpiInstrument.systemErrorCount',
        'Counter.countQuery',
        'Counter.count',
        'Counter.explode',
        'Counter.shadow',
      ]);
    });
  });

  describe('errors', () => {
    it('queues -113 for an unknown header and returns null', () => {
      expect(session.handleCommand('BOGUS:COMMAND')).toBeNull();
      expect(session.handleCommand('SYST:ERR?')).toBe('-113,"Undefined header"');
      expect(session.handleCommand('SYST:ERR?')).toBe('0,"No error"');
    });

    it('queues the code returned by a failing handler', () => {
      expect(session.handleCommand('COUNT many')).toBeNull();
      expect(session.handleCommand('SYST:ERR?')).toBe('-104,"Data type error"');
      expect(session.handleCommand('*ESR?')).toBe('32');
    });

    describe('thrown exceptions', () => {
      beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
      });

      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('become -300 without reaching the caller', () => {
        expect(session.handleCommand('EXPLODE')).toBeNull();
        expect(session.handleCommand('SYST:ERR?')).toBe('-300,"Device error"');
        expect(session.handleCommand('*ESR?')).toBe('8');
      });

      it('are logged with the command key', () => {
        session.handleCommand('EXPL');
        expect(console.error).toHaveBeenCalledTimes(1);
        expect(vi.mocked(console.error).mock.calls[0][0]).toBe('[Dispatcher] Counter.explode failed on "EXPL":');
      });

      it('leave the session usable', () => {
        session.handleCommand('EXPLODE');
        expect(session.handleCommand('*IDN?')).toBe('TEST,COUNTER,0,1.0');
      });
    });
  });

  describe('common commands', () => {
    it('*OPC? answers 1 and sets the OPC bit', () => {
      expect(session.handleCommand('*OPC?')).toBe('1');
      expect(session.handleCommand('*ESR?')).toBe('1');
    });

    it('*WAI is accepted silently', () => {
      expect(session.handleCommand('*WAI')).toBeNull();
      expect(session.instrument.status.getErrorCount()).toBe(0);
    });

    it('*TST? reports a passing self-test', () => {
      expect(session.handleCommand('*TST?')).toBe('0');
    });

    it('*CLS clears ESR and the error queue', () => {
      session.handleCommand('BOGUS');
      session.handleCommand('*CLS');
      expect(session.handleCommand('*ESR?')).toBe('0');
      expect(session.handleCommand('SYST:ERR:COUN?')).toBe('0');
    });

    it('*ESR? is read-and-clear', () => {
      session.handleCommand('BOGUS');
      expect(session.handleCommand('*ESR?')).toBe('32');
      expect(session.handleCommand('*ESR?')).toBe('0');
    });

    it('*RST clears status and resets device state', () => {
      session.handleCommand('COUNT 9');
      session.handleCommand('BOGUS');
      expect(session.handleCommand('*RST')).toBeNull();

      expect(session.instrument.count).toBe(0);
      expect(session.handleCommand('SYST:ERR?')).toBe('0,"No error"');
      expect(session.handleCommand('*ESR?')).toBe('0');
    });

    it('*SRE sets the enable mask without a response', () => {
      expect(session.handleCommand('*SRE 32')).toBeNull();
      expect(session.handleCommand('*SRE?')).toBe('32');
    });

    it('*SRE and *ESE take masks modulo 256', () => {
      session.handleCommand('*SRE 288');
      session.handleCommand('*ESE 99999999999999999999999');
      expect(session.handleCommand('*SRE?')).toBe('32');
      // 99999999999999999999999 mod 256 = 255
      expect(session.handleCommand('*ESE?')).toBe('255');
    });

    it('*STB? reports the summary bit for enabled events', () => {
      session.handleCommand('*SRE 32');
      expect(session.handleCommand('*STB?')).toBe('0');

      session.handleCommand('BOGUS:COMMAND');
      expect(session.handleCommand('*STB?')).toBe('32');
    });

    it('*STB? does not clear ESR', () => {
      session.handleCommand('*SRE 32');
      session.handleCommand('BOGUS');
      session.handleCommand('*STB?');
      expect(session.handleCommand('*STB?')).toBe('32');
    });

    it('*SRE without a mask is an undefined header', () => {
      expect(session.handleCommand('*SRE')).toBeNull();
      expect(session.handleCommand('SYST:ERR?')).toBe('-113,"Undefined header"');
    });

    it('accepts the long and :NEXT forms of SYSTem:ERRor?', () => {
      session.handleCommand('BOGUS1');
      session.handleCommand('BOGUS2');
      session.handleCommand('BOGUS3');
      expect(session.handleCommand('SYSTEM:ERROR?')).toBe('-113,"Undefined header"');
      expect(session.handleCommand('syst:err:next?')).toBe('-113,"Undefined header"');
      expect(session.handleCommand('SYST:ERR:COUNT?')).toBe('1');
    });
  });
});
