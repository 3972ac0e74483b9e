// src/function-codes/write-multiple-coils.ts

import { MAX_WRITE_COILS, ModbusFunctionCode } from '../constants/constants.js';
import { WriteMultipleCoilsResponse } from '../types/modbus-types.js';
import { packBits } from '../utils/utils.js';
import { parseWriteEcho, validateAddress, validateQuantity, validateRange } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_COILS;
const REQUEST_HEADER_SIZE = 6;

/**
 * Builds a Write Multiple Coils request PDU
 * @param startAddress - first coil
 * @param values - coil states, packed LSB-first (1-1968)
 */
export function buildWriteMultipleCoilsRequest(
  startAddress: number,
  values: readonly boolean[]
): Uint8Array {
  validateAddress(startAddress, 'startAddress');
  validateQuantity(values.length, 1, MAX_WRITE_COILS, 'values');
  validateRange(startAddress, values.length);

  const packed = packBits(values);
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + packed.length);
  const view = new DataView(pdu.buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, values.length, false);
  view.setUint8(5, packed.length);
  pdu.set(packed, REQUEST_HEADER_SIZE);

  return pdu;
}

export function parseWriteMultipleCoilsResponse(pdu: Uint8Array): WriteMultipleCoilsResponse {
  const [startAddress, quantity] = parseWriteEcho(pdu, FUNCTION_CODE);
  return { startAddress, quantity };
}
