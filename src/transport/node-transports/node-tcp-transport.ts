// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'node:net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, toHex } from '../../utils/utils.js';
import { logManager } from '../../logger.js';
import {
  ModbusConnectionError,
  ModbusConnectionRefusedError,
  ModbusConnectionTimeoutError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
} from '../../errors.js';
import {
  Transport,
  ConnectionErrorType,
  NodeTcpTransportOptions,
  PortStateHandler,
} from '../../types/modbus-types.js';

const logger = logManager.createLogger('NodeTcpTransport');

interface PendingRead {
  length: number;
  resolve: (data: Uint8Array) => void;
  reject: (err: Error) => void;
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Raw TCP byte stream to one host:port.
 */
class NodeTcpTransport implements Transport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = new Uint8Array(0);
  private _pendingRead: PendingRead | null = null;
  private _isDisconnecting: boolean = false;
  private _operationMutex: Mutex = new Mutex();
  private _portStateHandler: PortStateHandler | null = null;

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      connectTimeout: options.connectTimeout ?? 10000,
      readTimeout: options.readTimeout ?? 10000,
      writeTimeout: options.writeTimeout ?? 10000,
      maxBufferSize: options.maxBufferSize ?? 8192,
    };
  }

  private get target(): string {
    return `${this.host}:${this.port}`;
  }

  public setPortStateHandler(h: PortStateHandler): void {
    this._portStateHandler = h;
  }

  public async connect(): Promise<void> {
    if (this.isOpen) return;
    this._isDisconnecting = false;

    return new Promise<void>((resolve, reject) => {
      logger.debug(`Connecting to ${this.target}...`);
      const socket = new net.Socket();
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.destroy();
        reject(new ModbusConnectionTimeoutError(this.host, this.port, this.options.connectTimeout));
      }, this.options.connectTimeout);

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          socket.destroy();
          reject(this._mapConnectError(err));
          return;
        }
        this._onError(err);
      });

      socket.connect({ host: this.host, port: this.port }, () => {
        if (settled) {
          socket.destroy();
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.setNoDelay(true);
        socket.on('data', (data: Buffer) => this._onData(data));
        socket.on('close', () => this._onClose(socket));
        this.socket = socket;
        this.readBuffer = new Uint8Array(0);
        this.isOpen = true;
        logger.info(`Connected to ${this.target}`);
        this._portStateHandler?.(true);
        resolve();
      });
    });
  }

  private _mapConnectError(err: Error): ModbusConnectionError {
    if (errorCode(err) === 'ECONNREFUSED') {
      return new ModbusConnectionRefusedError(this.host, this.port);
    }
    return new ModbusConnectionError(`Connection to ${this.target} failed: ${err.message}`);
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data);
    logger.trace(`RX ${chunk.length} bytes: ${toHex(chunk)}`);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      logger.warn(`Receive buffer overflow on ${this.target}, dropping ${this.readBuffer.length} bytes`);
      this.readBuffer = new Uint8Array(0);
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    this._drain();
  }

  private _drain(): void {
    const pending = this._pendingRead;
    if (pending && this.readBuffer.length >= pending.length) {
      this._pendingRead = null;
      pending.resolve(this._take(pending.length));
    }
  }

  private _take(length: number): Uint8Array {
    const data = this.readBuffer.slice(0, length);
    this.readBuffer = this.readBuffer.slice(length);
    return data;
  }

  private _onError(err: Error): void {
    logger.error(`Socket error on ${this.target}: ${err.message}`);
  }

  private _onClose(socket: net.Socket): void {
    if (this.socket !== socket) return;
    const manual = this._isDisconnecting;
    this.isOpen = false;
    this.socket = null;

    const pending = this._pendingRead;
    this._pendingRead = null;
    pending?.reject(new ModbusConnectionError(`Connection to ${this.target} closed`));

    if (manual) {
      logger.debug(`Disconnected from ${this.target}`);
      this._portStateHandler?.(false, {
        type: ConnectionErrorType.ManualDisconnect,
        message: 'Closed by client',
      });
    } else {
      logger.warn(`Connection closed for ${this.target}`);
      this._portStateHandler?.(false, {
        type: ConnectionErrorType.ConnectionLost,
        message: `Connection to ${this.target} lost`,
      });
    }
  }

  public async write(
    buffer: Uint8Array,
    timeout: number = this.options.writeTimeout
  ): Promise<void> {
    return this._operationMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.socket;
          if (!this.isOpen || !socket) {
            reject(new ModbusNotConnectedError(this.target));
            return;
          }
          logger.trace(`TX ${buffer.length} bytes: ${toHex(buffer)}`);
          const timer = setTimeout(() => {
            reject(new ModbusTimeoutError(`Write timeout after ${timeout}ms to ${this.target}`));
          }, timeout);
          socket.write(Buffer.from(buffer), err => {
            clearTimeout(timer);
            if (err) reject(new ModbusConnectionError(`Write to ${this.target} failed: ${err.message}`));
            else resolve();
          });
        })
    );
  }

  /**
   * Resolves with exactly `length` bytes once they have arrived.
   */
  public async read(
    length: number,
    timeout: number = this.options.readTimeout
  ): Promise<Uint8Array> {
    return this._operationMutex.runExclusive(
      () =>
        new Promise<Uint8Array>((resolve, reject) => {
          if (this.readBuffer.length >= length) {
            resolve(this._take(length));
            return;
          }
          if (!this.isOpen) {
            reject(new ModbusNotConnectedError(this.target));
            return;
          }
          const timer = setTimeout(() => {
            this._pendingRead = null;
            reject(new ModbusTimeoutError(`Read timeout after ${timeout}ms from ${this.target}`));
          }, timeout);
          this._pendingRead = {
            length,
            resolve: data => {
              clearTimeout(timer);
              resolve(data);
            },
            reject: err => {
              clearTimeout(timer);
              reject(err);
            },
          };
        })
    );
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this._isDisconnecting = true;
    return new Promise<void>(resolve => {
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }
}

export default NodeTcpTransport;
