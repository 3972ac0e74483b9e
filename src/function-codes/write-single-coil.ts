// src/function-codes/write-single-coil.ts

import { COIL_OFF, COIL_ON, ModbusFunctionCode } from '../constants/constants.js';
import { ModbusMalformedFrameError } from '../errors.js';
import { WriteSingleCoilResponse } from '../types/modbus-types.js';
import { WRITE_ECHO_SIZE, parseWriteEcho, validateAddress } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_SINGLE_COIL;

/**
 * Builds a Write Single Coil request PDU. The coil state travels as 0xFF00 / 0x0000.
 */
export function buildWriteSingleCoilRequest(address: number, value: boolean): Uint8Array {
  validateAddress(address);

  const buffer = new ArrayBuffer(WRITE_ECHO_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value ? COIL_ON : COIL_OFF, false);

  return new Uint8Array(buffer);
}

/**
 * Parses the echo of a Write Single Coil request
 * @throws ModbusMalformedFrameError on a state word other than 0xFF00 / 0x0000
 */
export function parseWriteSingleCoilResponse(pdu: Uint8Array): WriteSingleCoilResponse {
  const [address, valueRaw] = parseWriteEcho(pdu, FUNCTION_CODE);

  switch (valueRaw) {
    case COIL_ON:
      return { address, value: true };
    case COIL_OFF:
      return { address, value: false };
    default:
      throw new ModbusMalformedFrameError(`invalid coil state 0x${valueRaw.toString(16)}`, pdu);
  }
}
