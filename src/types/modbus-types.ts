// src/types/modbus-types.ts

// !=============================================================================
// ! Function code responses
// !=============================================================================

export type ReadCoilsResponse = boolean[];

export type ReadDiscreteInputsResponse = boolean[];

export type ReadHoldingRegistersResponse = number[];

export type ReadInputRegistersResponse = number[];

/** Response to Write Single Coil (echo of the request) */
export interface WriteSingleCoilResponse {
  address: number;
  value: boolean;
}

/** Response to Write Multiple Coils */
export interface WriteMultipleCoilsResponse {
  startAddress: number;
  quantity: number;
}

/** Response to Write Single Register (echo of the request) */
export interface WriteSingleRegisterResponse {
  address: number;
  value: number;
}

/** Response to Write Multiple Registers */
export interface WriteMultipleRegistersResponse {
  startAddress: number;
  quantity: number;
}

/** One page of Read Device Identification (FC43 / MEI 0x0E) */
export interface ReadDeviceIdentificationResponse {
  meiType: number;
  readDeviceIdCode: number;
  conformityLevel: number;
  moreFollows: boolean;
  nextObjectId: number;
  numberOfObjects: number;
  objects: Record<number, string>;
}

/** Typed value decoded from registers or bits */
export type RegisterValue = number | boolean;

// !=============================================================================
// ! Framing
// !=============================================================================

/** MBAP header fields */
export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  /** Bytes following the length field, unit id included */
  length: number;
  unitId: number;
}

// !=============================================================================
// ! Transport
// !=============================================================================

/**
 * Connection error types
 */
export enum ConnectionErrorType {
  UnknownError = 'UnknownError',
  ConnectionLost = 'ConnectionLost',
  ManualDisconnect = 'ManualDisconnect',
}

export type PortStateHandler = (
  connected: boolean,
  error?: { type: ConnectionErrorType; message: string }
) => void;

/** Byte transport beneath a Modbus connection */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array, timeout?: number): Promise<void>;
  /** Resolves with exactly `length` bytes, or rejects on timeout / close */
  read(length: number, timeout?: number): Promise<Uint8Array>;
  setPortStateHandler(handler: PortStateHandler): void;
}

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  readTimeout?: number;
  writeTimeout?: number;
  maxBufferSize?: number;
}

export type TransportFactory = (
  host: string,
  port: number,
  options: NodeTcpTransportOptions
) => Transport;

// !=============================================================================
// ! Connections
// !=============================================================================

/** Logical device endpoint; unit id travels per request */
export interface DeviceKey {
  host: string;
  port: number;
  unitId: number;
}

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connected = 'connected',
  Faulted = 'faulted',
}

export interface ModbusConnectionOptions {
  /** TCP connect timeout, ms */
  connectTimeout?: number;
  /** Default deadline of one transaction, ms */
  requestTimeout?: number;
  transportFactory?: TransportFactory;
}

export interface PooledConnectionStatus {
  key: string;
  host: string;
  port: number;
  state: ConnectionState;
  lastUsed: number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

/** Logging levels */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Structured logging context */
export interface LogContext {
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  address?: number;
  quantity?: number;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | null | undefined;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Category logger handed out by the log manager */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsOptions {
  loggerName?: string;
  /** Number of recent error messages kept */
  maxRecentErrors?: number;
}

/** Traffic statistics of one connection */
export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  successfulResponses: number;
  errorResponses: number;
  /** Percent of requests that failed */
  errorRate: number | null;
  timeouts: number;
  frameErrors: number;
  modbusExceptions: number;
  exceptionCodeCounts: Record<number, number>;
  functionCallCounts: Record<string, number>;
  lastResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  totalDataSent: number;
  totalDataReceived: number;
  lastErrorMessage: string | null;
  recentErrors: string[];
  lastRequestTimestamp: string | null;
  lastSuccessTimestamp: string | null;
  lastErrorTimestamp: string | null;
}
