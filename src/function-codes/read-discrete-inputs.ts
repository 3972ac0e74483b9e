// src/function-codes/read-discrete-inputs.ts

import { MAX_READ_BITS, ModbusFunctionCode } from '../constants/constants.js';
import { ReadDiscreteInputsResponse } from '../types/modbus-types.js';
import { buildReadRequest, parseBitsResponse } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_DISCRETE_INPUTS;

export function buildReadDiscreteInputsRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity, MAX_READ_BITS);
}

export function parseReadDiscreteInputsResponse(
  pdu: Uint8Array,
  quantity: number
): ReadDiscreteInputsResponse {
  return parseBitsResponse(pdu, FUNCTION_CODE, quantity);
}
