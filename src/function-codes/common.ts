// src/function-codes/common.ts

import { MAX_ADDRESS, MIN_ADDRESS } from '../constants/constants.js';
import {
  ModbusInvalidAddressError,
  ModbusInvalidQuantityError,
  ModbusMalformedFrameError,
  ModbusUnexpectedFunctionCodeError,
} from '../errors.js';
import { unpackBits } from '../utils/utils.js';

export const READ_REQUEST_SIZE = 5;
export const READ_RESPONSE_HEADER_SIZE = 2;
export const WRITE_ECHO_SIZE = 5;
export const UINT16_SIZE = 2;

export function validateAddress(address: number, parameter: string = 'address'): void {
  if (!Number.isInteger(address) || address < MIN_ADDRESS || address > MAX_ADDRESS) {
    throw new ModbusInvalidAddressError(parameter, address);
  }
}

export function validateQuantity(
  quantity: number,
  min: number,
  max: number,
  parameter: string = 'quantity'
): void {
  if (!Number.isInteger(quantity) || quantity < min || quantity > max) {
    throw new ModbusInvalidQuantityError(parameter, quantity, min, max);
  }
}

/**
 * The addressed range must stay inside the 16-bit address space.
 */
export function validateRange(startAddress: number, quantity: number): void {
  if (startAddress + quantity - 1 > MAX_ADDRESS) {
    throw new ModbusInvalidAddressError('quantity', startAddress + quantity - 1);
  }
}

export function checkFunctionCode(pdu: Uint8Array, functionCode: number): void {
  if (pdu.length < 1) {
    throw new ModbusMalformedFrameError('empty PDU');
  }
  if (pdu[0] !== functionCode) {
    throw new ModbusUnexpectedFunctionCodeError(functionCode, pdu[0]);
  }
}

/**
 * PDU of FC1-FC4: function code, start address, quantity.
 */
export function buildReadRequest(
  functionCode: number,
  startAddress: number,
  quantity: number,
  maxQuantity: number
): Uint8Array {
  validateAddress(startAddress, 'startAddress');
  validateQuantity(quantity, 1, maxQuantity);
  validateRange(startAddress, quantity);

  const buffer = new ArrayBuffer(READ_REQUEST_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, functionCode);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);

  return new Uint8Array(buffer);
}

function readByteCount(pdu: Uint8Array, functionCode: number, expectedByteCount: number): number {
  checkFunctionCode(pdu, functionCode);
  if (pdu.length < READ_RESPONSE_HEADER_SIZE) {
    throw new ModbusMalformedFrameError('PDU too short for byte count', pdu);
  }
  const byteCount = pdu[1];
  if (byteCount !== expectedByteCount) {
    throw new ModbusMalformedFrameError(
      `byte count ${byteCount}, expected ${expectedByteCount}`,
      pdu
    );
  }
  if (pdu.length !== READ_RESPONSE_HEADER_SIZE + byteCount) {
    throw new ModbusMalformedFrameError(
      `PDU length ${pdu.length}, expected ${READ_RESPONSE_HEADER_SIZE + byteCount}`,
      pdu
    );
  }
  return byteCount;
}

/**
 * Parses an FC1/FC2 response carrying `quantity` packed bits.
 */
export function parseBitsResponse(
  pdu: Uint8Array,
  functionCode: number,
  quantity: number
): boolean[] {
  readByteCount(pdu, functionCode, Math.ceil(quantity / 8));
  return unpackBits(pdu.subarray(READ_RESPONSE_HEADER_SIZE), quantity);
}

/**
 * Parses an FC3/FC4 response carrying `quantity` big-endian words.
 */
export function parseRegistersResponse(
  pdu: Uint8Array,
  functionCode: number,
  quantity: number
): number[] {
  const byteCount = readByteCount(pdu, functionCode, quantity * UINT16_SIZE);
  const view = new DataView(pdu.buffer, pdu.byteOffset + READ_RESPONSE_HEADER_SIZE, byteCount);
  const registers: number[] = new Array(quantity);
  for (let i = 0; i < quantity; i++) {
    registers[i] = view.getUint16(i * UINT16_SIZE, false);
  }
  return registers;
}

/**
 * Reads the two words of a 5-byte write echo (FC5, FC6, FC15, FC16).
 */
export function parseWriteEcho(pdu: Uint8Array, functionCode: number): [number, number] {
  checkFunctionCode(pdu, functionCode);
  if (pdu.length !== WRITE_ECHO_SIZE) {
    throw new ModbusMalformedFrameError(
      `PDU length ${pdu.length}, expected ${WRITE_ECHO_SIZE}`,
      pdu
    );
  }
  const view = new DataView(pdu.buffer, pdu.byteOffset, WRITE_ECHO_SIZE);
  return [view.getUint16(1, false), view.getUint16(3, false)];
}
