// src/function-codes/read-input-registers.ts

import { MAX_READ_REGISTERS, ModbusFunctionCode } from '../constants/constants.js';
import { ReadInputRegistersResponse } from '../types/modbus-types.js';
import { buildReadRequest, parseRegistersResponse } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_INPUT_REGISTERS;

export function buildReadInputRegistersRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity, MAX_READ_REGISTERS);
}

export function parseReadInputRegistersResponse(
  pdu: Uint8Array,
  quantity: number
): ReadInputRegistersResponse {
  return parseRegistersResponse(pdu, FUNCTION_CODE, quantity);
}
