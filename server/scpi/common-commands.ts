/**
 * IEEE-488.2 common commands and the SYSTem:ERRor subsystem
 *
 * Every personality registers these into its own registry under the
 * ScpiInstrument owner and lists it as a direct parent.
 *
 * - *IDN?            - Identification
 * - *OPC?            - Operation complete (synchronous, always 1)
 * - *WAI             - Wait to continue (no-op)
 * - *RST             - Reset: *CLS, then the instrument's resetDeviceState()
 * - *CLS             - Clear status
 * - *ESR?            - Event status register, read-and-clear
 * - *ESE / *ESE?     - Event status enable
 * - *SRE / *SRE?     - Service request enable
 * - *STB?            - Status byte
 * - *TST?            - Self-test
 * - SYSTem:ERRor[:NEXT]?     - Oldest queued error
 * - SYSTem:ERRor:COUNt?      - Queued error count
 */

import { Ok } from '../../shared/types.js';
import type { CommandRegistry } from './registry.js';
import type { InstrumentType, ScpiInstrument } from './types.js';
import { ESR_OPC, formatErrorEntry } from './status.js';

export const SCPI_INSTRUMENT = 'ScpiInstrument';

export const SCPI_INSTRUMENT_TYPE: InstrumentType = {
  name: SCPI_INSTRUMENT,
  parents: [],
};

// Register masks are taken modulo 256, so exact integer math is needed for long digit strings
function toRegisterMask(digits: string): number {
  return Number(BigInt(digits) & 0xffn);
}

export function registerCommonCommands<I extends ScpiInstrument>(registry: CommandRegistry<I>): void {
  const owner = SCPI_INSTRUMENT;

  registry.register(owner, 'identity', /^\*IDN\?$/, instrument => Ok(instrument.identity));

  registry.register(owner, 'operationComplete', /^\*OPC\?$/, instrument => {
    instrument.status.setEsrBits(ESR_OPC);
    return Ok('1');
  });

  registry.register(owner, 'wait', /^\*WAI$/, () => Ok(null));

  registry.register(owner, 'reset', /^\*RST$/, instrument => {
    instrument.status.clear();
    instrument.resetDeviceState?.();
    return Ok(null);
  });

  registry.register(owner, 'clearStatus', /^\*CLS$/, instrument => {
    instrument.status.clear();
    return Ok(null);
  });

  registry.register(owner, 'eventStatusQuery', /^\*ESR\?$/, instrument =>
    Ok(String(instrument.status.readEsr()))
  );

  registry.register(owner, 'eventStatusEnable', /^\*ESE\s+(\d+)$/, (instrument, mask) => {
    instrument.status.setEse(toRegisterMask(mask));
    return Ok(null);
  });

  registry.register(owner, 'eventStatusEnableQuery', /^\*ESE\?$/, instrument =>
    Ok(String(instrument.status.getEse()))
  );

  registry.register(owner, 'serviceRequestEnable', /^\*SRE\s+(\d+)$/, (instrument, mask) => {
    instrument.status.setSre(toRegisterMask(mask));
    return Ok(null);
  });

  registry.register(owner, 'serviceRequestEnableQuery', /^\*SRE\?$/, instrument =>
    Ok(String(instrument.status.getSre()))
  );

  registry.register(owner, 'statusByte', /^\*STB\?$/, instrument =>
    Ok(String(instrument.status.getStatusByte()))
  );

  registry.register(owner, 'selfTest', /^\*TST\?$/, () => Ok('0'));

  registry.register(owner, 'systemError', /^SYST(?:em)?:ERR(?:or)?(?::NEXT)?\?$/, instrument =>
    Ok(formatErrorEntry(instrument.status.popError()))
  );

  registry.register(owner, 'systemErrorCount', /^SYST(?:em)?:ERR(?:or)?:COUN(?:t)?\?$/, instrument =>
    Ok(String(instrument.status.getErrorCount()))
  );
}
