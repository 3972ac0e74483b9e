// src/framers/modbus-framer.ts

import { MbapHeader } from '../types/modbus-types.js';

/**
 * Outstanding request a response is matched against
 */
export interface FramerContext {
  transactionId: number;
  unitId: number;
  functionCode: number;
}

/**
 * Builds and parses ADUs for one byte stream
 */
export interface ModbusFramer {
  /** Bytes to read before the remaining frame length is known */
  readonly headerLength: number;

  nextTransactionId(): number;

  /**
   * Wraps a PDU (function code + payload) into an ADU
   */
  buildAdu(transactionId: number, unitId: number, pdu: Uint8Array): Uint8Array;

  parseHeader(header: Uint8Array): MbapHeader;

  /**
   * Validates a complete response ADU against the request and returns its
   * PDU. Exception responses are thrown.
   */
  parseAdu(packet: Uint8Array, context: FramerContext): Uint8Array;
}
