// src/types/gateway-types.ts

import { ErrorDetail } from '../errors.js';
import { ConnectionState, DiagnosticsStats, RegisterValue } from './modbus-types.js';

/**
 * Uniform outcome of every gateway operation
 */
export type OperationResult<T> = { success: true; data: T } | { success: false; error: ErrorDetail };

// !=============================================================================
// ! Parameters
// !=============================================================================

/**
 * Tags such as `registerType` and `dataType` are plain strings here; unknown
 * tags are rejected by the operation before any I/O.
 */
export interface EndpointParams {
  host: string;
  /** Default 502 */
  port?: number;
}

export interface UnitParams extends EndpointParams {
  /** Default 1 */
  unitId?: number;
}

export interface ConnectParams extends UnitParams {
  /** Seconds, (0, 60] */
  timeout?: number;
  /** Read holding register 0 after connecting. Default true */
  probe?: boolean;
}

export interface ReadRegistersParams extends UnitParams {
  registerType: string;
  startAddress: number;
  /** Number of values, not registers */
  count: number;
  dataType?: string;
}

export interface WriteRegisterParams extends UnitParams {
  address: number;
  value: RegisterValue;
  /** Default holding */
  registerType?: string;
  dataType?: string;
}

export interface WriteMultipleRegistersParams extends UnitParams {
  startAddress: number;
  values: RegisterValue[];
  registerType?: string;
  dataType?: string;
}

export type ReadDeviceIdLevel = 'basic' | 'regular' | 'extended';

export interface DeviceInfoParams extends UnitParams {
  /** Default basic */
  level?: ReadDeviceIdLevel;
}

export interface DiagnosticsParams extends UnitParams {
  /** Default true */
  testRead?: boolean;
  /** Default 0 */
  testAddress?: number;
  /** Default holding */
  testRegisterType?: string;
}

export type DisconnectParams = EndpointParams;

// !=============================================================================
// ! Results
// !=============================================================================

export interface DeviceTarget {
  host: string;
  port: number;
  unitId: number;
}

export type ProbeStatus = 'responding' | 'exception' | 'unverified' | 'skipped';

export interface ConnectData extends DeviceTarget {
  key: string;
  reused: boolean;
  state: ConnectionState;
  probe: ProbeStatus;
  probeDetail: string | null;
}

export interface ReadRegistersData extends DeviceTarget {
  registerType: string;
  dataType: string;
  functionCode: number;
  startAddress: number;
  count: number;
  /** Registers or bits requested on the wire */
  quantity: number;
  values: RegisterValue[];
  /** Raw words; bits as 0/1 for coil and discrete reads */
  raw: number[];
}

export interface WriteRegisterData extends DeviceTarget {
  registerType: string;
  dataType: string;
  functionCode: number;
  address: number;
  value: RegisterValue;
  /** Words sent; [1] or [0] for a coil */
  registers: number[];
}

export interface WriteMultipleRegistersData extends DeviceTarget {
  registerType: string;
  dataType: string;
  functionCode: number;
  startAddress: number;
  count: number;
  quantity: number;
  values: RegisterValue[];
}

export interface DeviceInfoData extends DeviceTarget {
  level: ReadDeviceIdLevel;
  conformityLevel: number;
  /** Named objects (vendorName, productCode, ...) then object_0xNN for the rest */
  objects: Record<string, string>;
}

export type CheckStatus = 'pass' | 'partial' | 'fail' | 'skipped';

export interface DiagnosticCheck {
  name: 'connection' | 'latency' | 'test_read';
  status: CheckStatus;
  latencyMs: number | null;
  detail: string;
}

export interface DiagnosticsData extends DeviceTarget {
  passed: boolean;
  elapsedMs: number;
  state: ConnectionState;
  checks: DiagnosticCheck[];
  stats: DiagnosticsStats | null;
}

export interface DisconnectData {
  host: string;
  port: number;
  key: string;
  disconnected: boolean;
}
