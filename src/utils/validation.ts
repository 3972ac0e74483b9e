// src/utils/validation.ts

import {
  DataType,
  DEFAULT_PORT,
  DEFAULT_UNIT_ID,
  MAX_ADDRESS,
  MAX_TIMEOUT_SECONDS,
  MAX_UNIT_ID,
  MIN_ADDRESS,
  MIN_UNIT_ID,
  RegisterClass,
  isBitClass,
  isRegisterClass,
  isWritableClass,
} from '../constants/constants.js';
import {
  ModbusInvalidAddressError,
  ModbusInvalidOperationError,
  ModbusInvalidQuantityError,
  ModbusReadOnlyError,
  ModbusValidationError,
} from '../errors.js';
import { registerWidth, toDataType } from './register-codec.js';
import { DeviceTarget, EndpointParams, UnitParams } from '../types/gateway-types.js';

const MAX_HOST_LENGTH = 255;

export function validateHost(host: unknown): string {
  if (typeof host !== 'string' || host.trim().length === 0) {
    throw new ModbusValidationError('host', 'Host must be a non-empty string');
  }
  const trimmed = host.trim();
  if (trimmed.length > MAX_HOST_LENGTH) {
    throw new ModbusValidationError('host', `Host must be at most ${MAX_HOST_LENGTH} characters`);
  }
  return trimmed;
}

export function validatePort(port: unknown = DEFAULT_PORT): number {
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ModbusValidationError('port', `Port must be an integer between 1 and 65535, got ${String(port)}`);
  }
  return port;
}

export function validateUnitId(unitId: unknown = DEFAULT_UNIT_ID): number {
  if (
    typeof unitId !== 'number' ||
    !Number.isInteger(unitId) ||
    unitId < MIN_UNIT_ID ||
    unitId > MAX_UNIT_ID
  ) {
    throw new ModbusValidationError(
      'unit_id',
      `Unit ID must be an integer between ${MIN_UNIT_ID} and ${MAX_UNIT_ID}, got ${String(unitId)}`
    );
  }
  return unitId;
}

/**
 * Validates a timeout given in seconds and returns it in milliseconds.
 */
export function validateTimeout(seconds: unknown): number {
  if (
    typeof seconds !== 'number' ||
    !Number.isFinite(seconds) ||
    seconds <= 0 ||
    seconds > MAX_TIMEOUT_SECONDS
  ) {
    throw new ModbusValidationError(
      'timeout',
      `Timeout must be greater than 0 and at most ${MAX_TIMEOUT_SECONDS} seconds, got ${String(seconds)}`
    );
  }
  return Math.round(seconds * 1000);
}

export function validateAddress(address: unknown, parameter: string): number {
  if (
    typeof address !== 'number' ||
    !Number.isInteger(address) ||
    address < MIN_ADDRESS ||
    address > MAX_ADDRESS
  ) {
    throw new ModbusInvalidAddressError(parameter, typeof address === 'number' ? address : NaN);
  }
  return address;
}

export function validateCount(count: unknown, max: number, parameter: string): number {
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 1 || count > max) {
    throw new ModbusInvalidQuantityError(parameter, typeof count === 'number' ? count : NaN, 1, max);
  }
  return count;
}

/**
 * The last addressed register or bit must not pass 65535.
 */
export function validateSpan(
  startAddress: number,
  quantity: number,
  parameter: string
): void {
  const last = startAddress + quantity - 1;
  if (last > MAX_ADDRESS) {
    throw new ModbusValidationError(
      parameter,
      `Range ${startAddress}..${last} runs past the last address ${MAX_ADDRESS}`
    );
  }
}

export function validateRegisterClass(registerType: unknown, parameter: string = 'register_type'): RegisterClass {
  if (!isRegisterClass(registerType)) {
    throw new ModbusValidationError(
      parameter,
      `Register type must be one of holding, input, coil, discrete, got ${String(registerType)}`
    );
  }
  return registerType;
}

/**
 * Narrows a register type for writing.
 * @throws ModbusReadOnlyError for input and discrete
 */
export function validateWritableClass(registerType: unknown): RegisterClass {
  const registerClass = validateRegisterClass(registerType);
  if (!isWritableClass(registerClass)) {
    throw new ModbusReadOnlyError(registerClass);
  }
  return registerClass;
}

/**
 * Narrows the data type and rejects 32-bit types against bit tables.
 */
export function validateDataType(
  dataType: unknown,
  registerClass: RegisterClass
): DataType {
  const narrowed = toDataType(dataType ?? DataType.UINT16, 'data_type');
  if (isBitClass(registerClass) && registerWidth(narrowed) > 1) {
    throw new ModbusInvalidOperationError(
      `Data type ${narrowed} spans two registers and cannot be used with ${registerClass}; coils and discrete inputs are single bits`,
      'data_type'
    );
  }
  return narrowed;
}

export function validateEndpoint(params: EndpointParams): { host: string; port: number } {
  return { host: validateHost(params.host), port: validatePort(params.port) };
}

export function validateTarget(params: UnitParams): DeviceTarget {
  return { ...validateEndpoint(params), unitId: validateUnitId(params.unitId) };
}
