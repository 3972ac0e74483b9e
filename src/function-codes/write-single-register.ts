// src/function-codes/write-single-register.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import { ModbusEncodingError } from '../errors.js';
import { WriteSingleRegisterResponse } from '../types/modbus-types.js';
import { WRITE_ECHO_SIZE, parseWriteEcho, validateAddress } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_SINGLE_REGISTER;

export function validateRegisterWord(value: number, parameter: string = 'value'): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new ModbusEncodingError(`Register word must be 0-65535, got ${value}`, parameter);
  }
}

/**
 * Builds a Write Single Register request PDU
 * @param address - register address
 * @param value - raw 16-bit word
 */
export function buildWriteSingleRegisterRequest(address: number, value: number): Uint8Array {
  validateAddress(address);
  validateRegisterWord(value);

  const buffer = new ArrayBuffer(WRITE_ECHO_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value, false);

  return new Uint8Array(buffer);
}

export function parseWriteSingleRegisterResponse(pdu: Uint8Array): WriteSingleRegisterResponse {
  const [address, value] = parseWriteEcho(pdu, FUNCTION_CODE);
  return { address, value };
}
