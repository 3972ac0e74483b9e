// src/function-codes/read-coils.ts

import { MAX_READ_BITS, ModbusFunctionCode } from '../constants/constants.js';
import { ReadCoilsResponse } from '../types/modbus-types.js';
import { buildReadRequest, parseBitsResponse } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_COILS;

/**
 * Builds a Read Coils request PDU
 * @param startAddress - first coil
 * @param quantity - number of bits (1-2000)
 */
export function buildReadCoilsRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity, MAX_READ_BITS);
}

/**
 * Parses a Read Coils response PDU; padding bits of the last byte are dropped.
 */
export function parseReadCoilsResponse(pdu: Uint8Array, quantity: number): ReadCoilsResponse {
  return parseBitsResponse(pdu, FUNCTION_CODE, quantity);
}
