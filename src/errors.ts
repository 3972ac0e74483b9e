// src/errors.ts

import { describeExceptionCode } from './constants/constants.js';
import { toHex } from './utils/utils.js';

/**
 * Stable classification carried by every Modbus error and by failed operation outcomes.
 */
export type ModbusErrorKind =
  | 'connection'
  | 'timeout'
  | 'frame'
  | 'device_exception'
  | 'validation'
  | 'read_only'
  | 'not_supported'
  | 'encoding'
  | 'invalid_operation'
  | 'unexpected';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  readonly kind: ModbusErrorKind;
  /** Caller parameter the error refers to, when there is one */
  readonly parameter?: string;

  constructor(message: string, kind: ModbusErrorKind = 'unexpected', parameter?: string) {
    super(message);
    this.name = 'ModbusError';
    this.kind = kind;
    this.parameter = parameter;
  }
}

// --- Errors for Connection and Transport ---

/**
 * Error class for TCP-level failures (establishing or keeping the socket)
 */
export class ModbusConnectionError extends ModbusError {
  constructor(message: string = 'Modbus connection failed') {
    super(message, 'connection');
    this.name = 'ModbusConnectionError';
  }
}

/**
 * Error class for connection refused
 */
export class ModbusConnectionRefusedError extends ModbusConnectionError {
  constructor(host: string, port: number) {
    super(`Connection refused to ${host}:${port}`);
    this.name = 'ModbusConnectionRefusedError';
  }
}

/**
 * Error class for connection timeout
 */
export class ModbusConnectionTimeoutError extends ModbusConnectionError {
  constructor(host: string, port: number, timeout: number) {
    super(`Connection timeout to ${host}:${port} after ${timeout}ms`);
    this.name = 'ModbusConnectionTimeoutError';
  }
}

/**
 * Error class for not connected
 */
export class ModbusNotConnectedError extends ModbusConnectionError {
  constructor(target: string = 'Modbus device') {
    super(`Not connected to ${target}`);
    this.name = 'ModbusNotConnectedError';
  }
}

/**
 * Error class for Modbus timeout (no matching response before the deadline)
 */
export class ModbusTimeoutError extends ModbusError {
  constructor(message: string = 'Modbus request timed out') {
    super(message, 'timeout');
    this.name = 'ModbusTimeoutError';
  }
}

// --- Errors for Message Format ---

/**
 * Error class for malformed or mismatched ADUs
 */
export class ModbusFrameError extends ModbusError {
  constructor(message: string = 'Invalid Modbus frame') {
    super(message, 'frame');
    this.name = 'ModbusFrameError';
  }
}

/**
 * Error class for malformed Modbus frame
 */
export class ModbusMalformedFrameError extends ModbusFrameError {
  constructor(reason: string, rawData?: Uint8Array) {
    super(
      rawData
        ? `Malformed Modbus frame (${reason}): ${toHex(rawData)}`
        : `Malformed Modbus frame (${reason})`
    );
    this.name = 'ModbusMalformedFrameError';
  }
}

/**
 * Error class for invalid frame length
 */
export class ModbusInvalidFrameLengthError extends ModbusFrameError {
  constructor(received: number, expected: number) {
    super(`Invalid frame length: received ${received}, expected ${expected}`);
    this.name = 'ModbusInvalidFrameLengthError';
  }
}

/**
 * Error class for invalid Modbus transaction ID
 */
export class ModbusInvalidTransactionIdError extends ModbusFrameError {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number) {
    super(`Invalid transaction ID: received ${received}, expected ${expected}`);
    this.name = 'ModbusInvalidTransactionIdError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for a response addressed from another unit
 */
export class ModbusUnitIdMismatchError extends ModbusFrameError {
  constructor(received: number, expected: number) {
    super(`Unit ID mismatch: received ${received}, expected ${expected}`);
    this.name = 'ModbusUnitIdMismatchError';
  }
}

/**
 * Error class for unexpected function code in response
 */
export class ModbusUnexpectedFunctionCodeError extends ModbusFrameError {
  constructor(sent: number, received: number) {
    super(
      `Unexpected function code: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'ModbusUnexpectedFunctionCodeError';
  }
}

// --- Device exceptions ---

/**
 * Error class for Modbus exception responses
 */
export class ModbusExceptionError extends ModbusError {
  readonly functionCode: number;
  readonly exceptionCode: number;
  readonly exceptionName: string;

  constructor(functionCode: number, exceptionCode: number) {
    const exceptionName = describeExceptionCode(exceptionCode);
    super(
      `Modbus exception: function 0x${functionCode.toString(16).padStart(2, '0')}, code 0x${exceptionCode.toString(16).padStart(2, '0')} (${exceptionName})`,
      'device_exception'
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
    this.exceptionName = exceptionName;
  }
}

/**
 * Error class for optional functions the device declines (e.g. FC43)
 */
export class ModbusNotSupportedError extends ModbusError {
  readonly functionCode: number;
  readonly exceptionCode?: number;

  constructor(functionCode: number, exceptionCode?: number) {
    super(
      exceptionCode === undefined
        ? `Function 0x${functionCode.toString(16).padStart(2, '0')} is not supported by the device`
        : `Function 0x${functionCode.toString(16).padStart(2, '0')} is not supported by the device (${describeExceptionCode(exceptionCode)})`,
      'not_supported'
    );
    this.name = 'ModbusNotSupportedError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
  }
}

// --- Errors raised before any I/O ---

/**
 * Error class for caller parameters outside their allowed range or type
 */
export class ModbusValidationError extends ModbusError {
  constructor(parameter: string, message: string) {
    super(message, 'validation', parameter);
    this.name = 'ModbusValidationError';
  }
}

/**
 * Error class for invalid quantity (register/coil count)
 */
export class ModbusInvalidQuantityError extends ModbusValidationError {
  constructor(parameter: string, quantity: number, min: number, max: number) {
    super(parameter, `Invalid quantity: ${quantity}. Must be between ${min}-${max}.`);
    this.name = 'ModbusInvalidQuantityError';
  }
}

/**
 * Error class for invalid Modbus address
 */
export class ModbusInvalidAddressError extends ModbusValidationError {
  constructor(parameter: string, address: number) {
    super(parameter, `Invalid Modbus address: ${address}. Address must be between 0-65535.`);
    this.name = 'ModbusInvalidAddressError';
  }
}

/**
 * Error class for writes against input registers or discrete inputs
 */
export class ModbusReadOnlyError extends ModbusError {
  constructor(registerType: string) {
    super(
      `Cannot write to read-only register type '${registerType}'. Only 'holding' and 'coil' are writable.`,
      'read_only',
      'register_type'
    );
    this.name = 'ModbusReadOnlyError';
  }
}

/**
 * Error class for value/type mismatches during encode or decode
 */
export class ModbusEncodingError extends ModbusError {
  constructor(message: string, parameter?: string) {
    super(message, 'encoding', parameter);
    this.name = 'ModbusEncodingError';
  }
}

/**
 * Error class for data type and register class combinations that cannot work
 */
export class ModbusInvalidOperationError extends ModbusError {
  constructor(message: string, parameter?: string) {
    super(message, 'invalid_operation', parameter);
    this.name = 'ModbusInvalidOperationError';
  }
}

/**
 * Error class for invalid start-up configuration
 */
export class ModbusConfigError extends ModbusError {
  constructor(variable: string, message: string) {
    super(`Invalid configuration ${variable}: ${message}`, 'validation', variable);
    this.name = 'ModbusConfigError';
  }
}

// --- Outcome mapping ---

/**
 * Structured failure detail handed to callers
 */
export interface ErrorDetail {
  kind: ModbusErrorKind;
  message: string;
  parameter?: string;
  functionCode?: number;
  exceptionCode?: number;
  exceptionName?: string;
}

/**
 * Converts any thrown value into an {@link ErrorDetail}.
 */
export function toErrorDetail(err: unknown): ErrorDetail {
  if (err instanceof ModbusExceptionError) {
    return {
      kind: err.kind,
      message: err.message,
      functionCode: err.functionCode,
      exceptionCode: err.exceptionCode,
      exceptionName: err.exceptionName,
    };
  }
  if (err instanceof ModbusNotSupportedError) {
    const detail: ErrorDetail = {
      kind: err.kind,
      message: err.message,
      functionCode: err.functionCode,
    };
    if (err.exceptionCode !== undefined) {
      detail.exceptionCode = err.exceptionCode;
      detail.exceptionName = describeExceptionCode(err.exceptionCode);
    }
    return detail;
  }
  if (err instanceof ModbusError) {
    const detail: ErrorDetail = { kind: err.kind, message: err.message };
    if (err.parameter !== undefined) detail.parameter = err.parameter;
    return detail;
  }
  if (err instanceof Error) {
    return { kind: 'unexpected', message: `${err.name}: ${err.message}` };
  }
  return { kind: 'unexpected', message: String(err) };
}
