// src/function-codes/read-device-identification.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import { ModbusMalformedFrameError, ModbusValidationError } from '../errors.js';
import { ReadDeviceIdentificationResponse } from '../types/modbus-types.js';
import { checkFunctionCode } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_DEVICE_IDENTIFICATION;
export const MEI_TYPE = 0x0e;
const MIN_RESPONSE_SIZE = 7;
const TEXT_ENCODING = 'latin1';

const TEXT_DECODER = new TextDecoder(TEXT_ENCODING);

/**
 * Read Device ID codes (streaming access categories)
 */
export enum ReadDeviceIdCode {
  BASIC = 0x01,
  REGULAR = 0x02,
  EXTENDED = 0x03,
}

export const DEVICE_ID_OBJECT_NAMES = new Map<number, string>([
  [0x00, 'vendorName'],
  [0x01, 'productCode'],
  [0x02, 'majorMinorRevision'],
  [0x03, 'vendorUrl'],
  [0x04, 'productName'],
  [0x05, 'modelName'],
  [0x06, 'userApplicationName'],
]);

export function deviceIdObjectName(objectId: number): string {
  return (
    DEVICE_ID_OBJECT_NAMES.get(objectId) ?? `object_0x${objectId.toString(16).padStart(2, '0')}`
  );
}

/**
 * Builds a Read Device Identification request PDU
 * @param readDeviceIdCode - access category (basic by default)
 * @param objectId - first object to return
 */
export function buildReadDeviceIdentificationRequest(
  readDeviceIdCode: ReadDeviceIdCode = ReadDeviceIdCode.BASIC,
  objectId: number = 0x00
): Uint8Array {
  if (!Number.isInteger(objectId) || objectId < 0 || objectId > 0xff) {
    throw new ModbusValidationError('objectId', `Object id must be 0-255, got ${objectId}`);
  }
  const buffer = new ArrayBuffer(4);
  const view = new DataView(buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint8(1, MEI_TYPE);
  view.setUint8(2, readDeviceIdCode);
  view.setUint8(3, objectId);

  return new Uint8Array(buffer);
}

/**
 * Parses one response page of Read Device Identification
 * @throws ModbusMalformedFrameError on a wrong MEI type or truncated object list
 */
export function parseReadDeviceIdentificationResponse(
  pdu: Uint8Array
): ReadDeviceIdentificationResponse {
  checkFunctionCode(pdu, FUNCTION_CODE);

  const responseLength = pdu.length;
  if (responseLength < MIN_RESPONSE_SIZE) {
    throw new ModbusMalformedFrameError(
      `device identification response shorter than ${MIN_RESPONSE_SIZE} bytes`,
      pdu
    );
  }

  if (pdu[1] !== MEI_TYPE) {
    throw new ModbusMalformedFrameError(`MEI type 0x${pdu[1].toString(16)}, expected 0x0e`, pdu);
  }

  const result: ReadDeviceIdentificationResponse = {
    meiType: pdu[1],
    readDeviceIdCode: pdu[2],
    conformityLevel: pdu[3],
    moreFollows: pdu[4] === 0xff,
    nextObjectId: pdu[5],
    numberOfObjects: pdu[6],
    objects: {},
  };

  let offset = MIN_RESPONSE_SIZE;

  for (let i = 0; i < result.numberOfObjects; i++) {
    if (offset + 2 > responseLength) {
      throw new ModbusMalformedFrameError(`object ${i} header truncated`, pdu);
    }

    const objectId = pdu[offset];
    const length = pdu[offset + 1];
    offset += 2;

    if (offset + length > responseLength) {
      throw new ModbusMalformedFrameError(`object 0x${objectId.toString(16)} value truncated`, pdu);
    }

    result.objects[objectId] = TEXT_DECODER.decode(pdu.subarray(offset, offset + length));
    offset += length;
  }

  return result;
}
