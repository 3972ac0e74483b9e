// src/function-codes/read-holding-registers.ts

import { MAX_READ_REGISTERS, ModbusFunctionCode } from '../constants/constants.js';
import { ReadHoldingRegistersResponse } from '../types/modbus-types.js';
import { buildReadRequest, parseRegistersResponse } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_HOLDING_REGISTERS;

/**
 * Builds a Read Holding Registers request PDU
 * @param startAddress - first register
 * @param quantity - number of registers (1-125)
 */
export function buildReadHoldingRegistersRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity, MAX_READ_REGISTERS);
}

/**
 * Parses a Read Holding Registers response PDU into raw 16-bit words.
 * @throws ModbusMalformedFrameError when the byte count disagrees with `quantity`
 */
export function parseReadHoldingRegistersResponse(
  pdu: Uint8Array,
  quantity: number
): ReadHoldingRegistersResponse {
  return parseRegistersResponse(pdu, FUNCTION_CODE, quantity);
}
