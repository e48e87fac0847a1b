/**
 * SCPI protocol errors
 *
 * Handlers report recoverable faults by returning Err(ScpiError). The
 * dispatcher turns them into error queue entries; they never reach the
 * wire inline. Codes follow the SCPI-99 standard error list.
 */

export interface ScpiError {
  code: number;
  message: string;
}

export const ScpiError = {
  // Command errors (-1xx)
  dataType(): ScpiError {
    return { code: -104, message: 'Data type error' };
  },

  parameterNotAllowed(): ScpiError {
    return { code: -108, message: 'Parameter not allowed' };
  },

  undefinedHeader(): ScpiError {
    return { code: -113, message: 'Undefined header' };
  },

  suffixOutOfRange(): ScpiError {
    return { code: -114, message: 'Header suffix out of range' };
  },

  // Execution errors (-2xx)
  settingsConflict(): ScpiError {
    return { code: -221, message: 'Settings conflict' };
  },

  outOfRange(): ScpiError {
    return { code: -222, message: 'Data out of range' };
  },

  illegalValue(): ScpiError {
    return { code: -224, message: 'Illegal parameter value' };
  },

  // Device-specific errors (-3xx)
  deviceError(): ScpiError {
    return { code: -300, message: 'Device error' };
  },

  queueOverflow(): ScpiError {
    return { code: -350, message: 'Queue overflow' };
  },
};
