// src/framers/tcp-framer.ts

import { ModbusFramer, FramerContext } from './modbus-framer.js';
import { concatUint8Arrays } from '../utils/utils.js';
import {
  MAX_MBAP_LENGTH,
  MAX_TRANSACTION_ID,
  MBAP_HEADER_LENGTH,
  MODBUS_PROTOCOL_ID,
} from '../constants/constants.js';
import {
  ModbusExceptionError,
  ModbusInvalidFrameLengthError,
  ModbusInvalidTransactionIdError,
  ModbusMalformedFrameError,
  ModbusUnexpectedFunctionCodeError,
  ModbusUnitIdMismatchError,
} from '../errors.js';
import { MbapHeader } from '../types/modbus-types.js';

/**
 * Modbus TCP framing: 7-byte MBAP header followed by the PDU. The length field
 * is the only frame delimiter on the stream.
 */
export class TcpFramer implements ModbusFramer {
  readonly headerLength: number = MBAP_HEADER_LENGTH;

  private _transactionId: number;

  constructor(initialTransactionId: number = 0) {
    this._transactionId = initialTransactionId & MAX_TRANSACTION_ID;
  }

  /**
   * Next transaction id, wrapping after 65535
   */
  public nextTransactionId(): number {
    this._transactionId = (this._transactionId + 1) % (MAX_TRANSACTION_ID + 1);
    return this._transactionId;
  }

  public get currentTransactionId(): number {
    return this._transactionId;
  }

  public buildAdu(transactionId: number, unitId: number, pdu: Uint8Array): Uint8Array {
    if (pdu.length < 1 || pdu.length + 1 > MAX_MBAP_LENGTH) {
      throw new ModbusMalformedFrameError(`PDU length ${pdu.length} outside 1..${MAX_MBAP_LENGTH - 1}`);
    }
    const mbap = new Uint8Array(MBAP_HEADER_LENGTH);
    const view = new DataView(mbap.buffer);

    view.setUint16(0, transactionId, false);
    view.setUint16(2, MODBUS_PROTOCOL_ID, false);
    view.setUint16(4, pdu.length + 1, false); // unit id + PDU
    view.setUint8(6, unitId);

    return concatUint8Arrays([mbap, pdu]);
  }

  public parseHeader(header: Uint8Array): MbapHeader {
    if (header.length < MBAP_HEADER_LENGTH) {
      throw new ModbusMalformedFrameError('too short for MBAP', header);
    }
    const view = new DataView(header.buffer, header.byteOffset, MBAP_HEADER_LENGTH);
    const parsed: MbapHeader = {
      transactionId: view.getUint16(0, false),
      protocolId: view.getUint16(2, false),
      length: view.getUint16(4, false),
      unitId: view.getUint8(6),
    };

    if (parsed.protocolId !== MODBUS_PROTOCOL_ID) {
      throw new ModbusMalformedFrameError(`invalid protocol id ${parsed.protocolId}`);
    }
    // unit id + function code at minimum
    if (parsed.length < 2 || parsed.length > MAX_MBAP_LENGTH) {
      throw new ModbusMalformedFrameError(`declared length ${parsed.length} outside 2..${MAX_MBAP_LENGTH}`);
    }
    return parsed;
  }

  public parseAdu(packet: Uint8Array, context: FramerContext): Uint8Array {
    const header = this.parseHeader(packet);
    const expectedLength = MBAP_HEADER_LENGTH - 1 + header.length;
    if (packet.length !== expectedLength) {
      throw new ModbusInvalidFrameLengthError(packet.length, expectedLength);
    }

    if (header.transactionId !== context.transactionId) {
      throw new ModbusInvalidTransactionIdError(header.transactionId, context.transactionId);
    }
    if (header.unitId !== context.unitId) {
      throw new ModbusUnitIdMismatchError(header.unitId, context.unitId);
    }

    const functionCode = packet[MBAP_HEADER_LENGTH];
    if (functionCode === (context.functionCode | 0x80)) {
      if (packet.length !== MBAP_HEADER_LENGTH + 2) {
        throw new ModbusMalformedFrameError('exception response must carry exactly one code byte', packet);
      }
      throw new ModbusExceptionError(context.functionCode, packet[MBAP_HEADER_LENGTH + 1]);
    }
    if (functionCode !== context.functionCode) {
      throw new ModbusUnexpectedFunctionCodeError(context.functionCode, functionCode);
    }

    return packet.subarray(MBAP_HEADER_LENGTH);
  }
}
