// src/function-codes/write-multiple-registers.ts

import { MAX_WRITE_REGISTERS, ModbusFunctionCode } from '../constants/constants.js';
import { WriteMultipleRegistersResponse } from '../types/modbus-types.js';
import {
  UINT16_SIZE,
  parseWriteEcho,
  validateAddress,
  validateQuantity,
  validateRange,
} from './common.js';
import { validateRegisterWord } from './write-single-register.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
const REQUEST_HEADER_SIZE = 6;

/**
 * Builds a Write Multiple Registers request PDU
 * @param startAddress - first register
 * @param values - raw 16-bit words (1-123)
 * @throws ModbusInvalidQuantityError if the word count is outside 1-123
 * @throws ModbusEncodingError if a word is outside 0-65535
 */
export function buildWriteMultipleRegistersRequest(
  startAddress: number,
  values: readonly number[]
): Uint8Array {
  validateAddress(startAddress, 'startAddress');

  const quantity = values.length;
  validateQuantity(quantity, 1, MAX_WRITE_REGISTERS, 'values');
  validateRange(startAddress, quantity);
  values.forEach((value, i) => validateRegisterWord(value, `values[${i}]`));

  const byteCount = quantity * UINT16_SIZE;
  const buffer = new ArrayBuffer(REQUEST_HEADER_SIZE + byteCount);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  view.setUint8(5, byteCount);

  for (let i = 0; i < quantity; i++) {
    view.setUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, values[i], false);
  }

  return new Uint8Array(buffer);
}

/**
 * Parses the Write Multiple Registers response (start address and quantity echo)
 */
export function parseWriteMultipleRegistersResponse(
  pdu: Uint8Array
): WriteMultipleRegistersResponse {
  const [startAddress, quantity] = parseWriteEcho(pdu, FUNCTION_CODE);
  return { startAddress, quantity };
}
