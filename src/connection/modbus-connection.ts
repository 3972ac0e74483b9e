// src/connection/modbus-connection.ts

import { Mutex } from 'async-mutex';
import { TcpFramer } from '../framers/tcp-framer.js';
import { FramerContext, ModbusFramer } from '../framers/modbus-framer.js';
import NodeTcpTransport from '../transport/node-transports/node-tcp-transport.js';
import Diagnostics from '../utils/diagnostics.js';
import { concatUint8Arrays } from '../utils/utils.js';
import { logManager } from '../logger.js';
import {
  ModbusError,
  ModbusExceptionError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
} from '../errors.js';
import {
  ConnectionErrorType,
  ConnectionState,
  DiagnosticsStats,
  ModbusConnectionOptions,
  Transport,
  TransportFactory,
} from '../types/modbus-types.js';

const logger = logManager.createLogger('ModbusConnection');

const DEFAULT_CONNECT_TIMEOUT = 10000;
const DEFAULT_REQUEST_TIMEOUT = 10000;
/** Abandoned transaction ids remembered per connection */
const MAX_ABANDONED_TRANSACTIONS = 32;

export const defaultTransportFactory: TransportFactory = (host, port, options) =>
  new NodeTcpTransport(host, port, options);

/**
 * One TCP socket to one host:port. Transactions are strictly sequential: a
 * request is sent only after the previous one resolved or timed out.
 *
 * A timeout or frame error marks the connection Faulted. The pool never
 * hands out a Faulted connection again; a caller holding one directly may
 * keep using it while the socket is open, and late answers to abandoned
 * requests are never matched to later ones.
 */
export class ModbusConnection {
  readonly host: string;
  readonly port: number;
  readonly connectTimeout: number;
  readonly requestTimeout: number;

  private _state: ConnectionState = ConnectionState.Disconnected;
  private _lastUsed: number = 0;
  private readonly _mutex: Mutex = new Mutex();
  private readonly _framer: ModbusFramer;
  private readonly _transport: Transport;
  private readonly _diagnostics: Diagnostics;
  private readonly _abandoned: Set<number> = new Set();
  /** Body bytes of a frame whose header was read before its request timed out */
  private _unreadBody: number = 0;

  constructor(host: string, port: number, options: ModbusConnectionOptions = {}) {
    this.host = host;
    this.port = port;
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
    this._framer = new TcpFramer();
    this._diagnostics = new Diagnostics({ loggerName: 'ModbusConnection' });

    const factory = options.transportFactory ?? defaultTransportFactory;
    this._transport = factory(host, port, {
      connectTimeout: this.connectTimeout,
      readTimeout: this.requestTimeout,
      writeTimeout: this.requestTimeout,
    });
    this._transport.setPortStateHandler((connected, error) => {
      if (!connected && error?.type === ConnectionErrorType.ConnectionLost) {
        if (this._state === ConnectionState.Connected) {
          this._fault(error.message);
        }
      }
    });
  }

  get key(): string {
    return `${this.host}:${this.port}`;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Epoch milliseconds of the last completed exchange or open */
  get lastUsed(): number {
    return this._lastUsed;
  }

  get stats(): DiagnosticsStats {
    return this._diagnostics.getStats();
  }

  /**
   * Opens the socket. Failures are not retried.
   * @throws ModbusConnectionError
   */
  async open(): Promise<void> {
    if (this._state === ConnectionState.Connected && this._transport.isOpen) return;
    await this._transport.connect();
    this._state = ConnectionState.Connected;
    this._lastUsed = Date.now();
    this._abandoned.clear();
    this._unreadBody = 0;
  }

  /**
   * Releases the socket. Closing a closed connection is a no-op.
   */
  async close(): Promise<void> {
    this._state = ConnectionState.Disconnected;
    this._abandoned.clear();
    this._unreadBody = 0;
    await this._transport.disconnect();
  }

  isAlive(): boolean {
    return this._state === ConnectionState.Connected && this._transport.isOpen;
  }

  /**
   * Sends one request and returns the payload of the matching response
   * (the bytes after the function code).
   * @param timeout - deadline for send and receive together, ms
   */
  async execute(
    unitId: number,
    functionCode: number,
    payload: Uint8Array,
    timeout?: number
  ): Promise<Uint8Array> {
    const response = await this.exchange(
      unitId,
      concatUint8Arrays([Uint8Array.of(functionCode), payload]),
      timeout
    );
    return response.subarray(1);
  }

  /**
   * Like {@link execute}, with the request and response as whole PDUs.
   */
  async exchange(
    unitId: number,
    pdu: Uint8Array,
    timeout: number = this.requestTimeout
  ): Promise<Uint8Array> {
    return this._mutex.runExclusive(() => this._transact(unitId, pdu, timeout));
  }

  private _nextTransactionId(): number {
    let transactionId = this._framer.nextTransactionId();
    while (this._abandoned.has(transactionId)) {
      transactionId = this._framer.nextTransactionId();
    }
    return transactionId;
  }

  private _abandon(transactionId: number): void {
    this._abandoned.add(transactionId);
    if (this._abandoned.size > MAX_ABANDONED_TRANSACTIONS) {
      const [oldest] = this._abandoned;
      this._abandoned.delete(oldest);
    }
  }

  private _fault(reason: string): void {
    if (this._state !== ConnectionState.Faulted) {
      logger.warn(`Connection ${this.key} faulted: ${reason}`);
    }
    this._state = ConnectionState.Faulted;
  }

  private async _transact(unitId: number, pdu: Uint8Array, timeout: number): Promise<Uint8Array> {
    if (!this._transport.isOpen) {
      throw new ModbusNotConnectedError(this.key);
    }

    const context: FramerContext = {
      transactionId: this._nextTransactionId(),
      unitId,
      functionCode: pdu[0],
    };
    const adu = this._framer.buildAdu(context.transactionId, unitId, pdu);
    const startTime = Date.now();
    const deadline = startTime + timeout;

    this._diagnostics.recordRequest(unitId, context.functionCode);
    logger.debug('Sending request', {
      unitId,
      funcCode: context.functionCode,
      transactionId: context.transactionId,
    });

    try {
      await this._transport.write(adu, this._remaining(deadline, timeout));
      this._diagnostics.recordDataSent(adu.length);

      const response = await this._receive(context, deadline, timeout);
      const responseTime = Date.now() - startTime;
      this._lastUsed = Date.now();
      this._diagnostics.recordSuccess(responseTime, unitId, context.functionCode);
      return response;
    } catch (err: unknown) {
      const responseTime = Date.now() - startTime;
      const error = err instanceof Error ? err : new ModbusError(String(err));
      this._diagnostics.recordError(error, responseTime, unitId, context.functionCode);

      if (err instanceof ModbusExceptionError) {
        // the device answered; the stream is still in sync
        this._lastUsed = Date.now();
        throw err;
      }
      if (err instanceof ModbusTimeoutError) {
        this._abandon(context.transactionId);
      }
      this._fault(error.message);
      throw err;
    }
  }

  private _remaining(deadline: number, timeout: number): number {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ModbusTimeoutError(`No response within ${timeout}ms from ${this.key}`);
    }
    return remaining;
  }

  /**
   * Reads whole frames until the one answering `context` arrives. Late
   * answers to abandoned transactions are dropped on the way, as is the
   * rest of a frame cut short by an earlier timeout.
   */
  private async _receive(
    context: FramerContext,
    deadline: number,
    timeout: number
  ): Promise<Uint8Array> {
    if (this._unreadBody > 0) {
      await this._transport.read(this._unreadBody, this._remaining(deadline, timeout));
      logger.debug(`Skipped ${this._unreadBody} bytes of an abandoned frame`);
      this._unreadBody = 0;
    }
    for (;;) {
      const header = await this._transport.read(
        this._framer.headerLength,
        this._remaining(deadline, timeout)
      );
      const mbap = this._framer.parseHeader(header);
      // the unit id counted by the length field is already in the header
      this._unreadBody = mbap.length - 1;
      const body = await this._transport.read(this._unreadBody, this._remaining(deadline, timeout));
      this._unreadBody = 0;
      this._diagnostics.recordDataReceived(header.length + body.length);

      if (mbap.transactionId !== context.transactionId && this._abandoned.has(mbap.transactionId)) {
        this._abandoned.delete(mbap.transactionId);
        logger.debug('Discarding late response of an abandoned transaction', {
          unitId: mbap.unitId,
          transactionId: mbap.transactionId,
        });
        continue;
      }
      return this._framer.parseAdu(concatUint8Arrays([header, body]), context);
    }
  }
}
