// src/gateway.ts

import {
  DataType,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_READ_BITS,
  MAX_READ_REGISTERS,
  MAX_WRITE_COILS,
  MAX_WRITE_REGISTERS,
  ModbusExceptionCode,
  ModbusFunctionCode,
  READ_FUNCTION_CODES,
  RegisterClass,
  isBitClass,
} from './constants/constants.js';
import { ConnectionPool } from './connection/connection-pool.js';
import { ModbusConnection } from './connection/modbus-connection.js';
import {
  ModbusExceptionError,
  ModbusMalformedFrameError,
  ModbusNotSupportedError,
  ModbusValidationError,
  toErrorDetail,
} from './errors.js';
import { logManager } from './logger.js';
import { buildReadCoilsRequest, parseReadCoilsResponse } from './function-codes/read-coils.js';
import {
  buildReadDiscreteInputsRequest,
  parseReadDiscreteInputsResponse,
} from './function-codes/read-discrete-inputs.js';
import {
  buildReadHoldingRegistersRequest,
  parseReadHoldingRegistersResponse,
} from './function-codes/read-holding-registers.js';
import {
  buildReadInputRegistersRequest,
  parseReadInputRegistersResponse,
} from './function-codes/read-input-registers.js';
import {
  buildWriteSingleCoilRequest,
  parseWriteSingleCoilResponse,
} from './function-codes/write-single-coil.js';
import {
  buildWriteSingleRegisterRequest,
  parseWriteSingleRegisterResponse,
} from './function-codes/write-single-register.js';
import {
  buildWriteMultipleCoilsRequest,
  parseWriteMultipleCoilsResponse,
} from './function-codes/write-multiple-coils.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
} from './function-codes/write-multiple-registers.js';
import {
  ReadDeviceIdCode,
  buildReadDeviceIdentificationRequest,
  deviceIdObjectName,
  parseReadDeviceIdentificationResponse,
} from './function-codes/read-device-identification.js';
import {
  decodeRegisters,
  encodeCoil,
  encodeValue,
  encodeValues,
  registerWidth,
} from './utils/register-codec.js';
import {
  validateAddress,
  validateCount,
  validateDataType,
  validateEndpoint,
  validateRegisterClass,
  validateSpan,
  validateTarget,
  validateTimeout,
  validateWritableClass,
} from './utils/validation.js';
import { ConnectionState, RegisterValue } from './types/modbus-types.js';
import {
  CheckStatus,
  ConnectData,
  ConnectParams,
  DeviceInfoData,
  DeviceInfoParams,
  DeviceTarget,
  DiagnosticCheck,
  DiagnosticsData,
  DiagnosticsParams,
  DisconnectData,
  DisconnectParams,
  OperationResult,
  ProbeStatus,
  ReadDeviceIdLevel,
  ReadRegistersData,
  ReadRegistersParams,
  WriteMultipleRegistersData,
  WriteMultipleRegistersParams,
  WriteRegisterData,
  WriteRegisterParams,
} from './types/gateway-types.js';

const logger = logManager.createLogger('ModbusGateway');

/** Rounds of FC43 paging before the answer is taken as complete */
const MAX_DEVICE_ID_ROUNDS = 16;

const READ_DEVICE_ID_CODES: Record<ReadDeviceIdLevel, ReadDeviceIdCode> = {
  basic: ReadDeviceIdCode.BASIC,
  regular: ReadDeviceIdCode.REGULAR,
  extended: ReadDeviceIdCode.EXTENDED,
};

function isReadDeviceIdLevel(value: unknown): value is ReadDeviceIdLevel {
  return Object.keys(READ_DEVICE_ID_CODES).some(level => level === value);
}

export interface ModbusGatewayOptions {
  /** Connect timeout in seconds for operations that open connections implicitly */
  defaultTimeout?: number;
}

interface RegisterReadPlan {
  functionCode: ModbusFunctionCode;
  quantity: number;
}

/**
 * The seven caller-facing operations. Parameters are validated before any
 * socket activity and every operation resolves to an {@link OperationResult};
 * none of them rejects.
 */
export class ModbusGateway {
  readonly pool: ConnectionPool;
  private readonly defaultTimeoutMs: number;

  constructor(pool: ConnectionPool, options: ModbusGatewayOptions = {}) {
    this.pool = pool;
    this.defaultTimeoutMs = validateTimeout(options.defaultTimeout ?? DEFAULT_TIMEOUT_SECONDS);
  }

  private async run<T>(operation: string, body: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return { success: true, data: await body() };
    } catch (err: unknown) {
      const error = toErrorDetail(err);
      if (error.kind === 'unexpected') {
        logger.error(`${operation} failed unexpectedly`, err);
      } else {
        logger.debug(`${operation} failed: ${error.message}`, {
          kind: error.kind,
          parameter: error.parameter,
          exceptionCode: error.exceptionCode,
        });
      }
      return { success: false, error };
    }
  }

  private connection(target: DeviceTarget): Promise<ModbusConnection> {
    return this.pool.getOrCreate(target, this.defaultTimeoutMs);
  }

  /**
   * Opens (or reuses) the pooled connection and optionally probes the unit
   * with a read of holding register 0. A failed probe is reported, not raised.
   */
  async connect(params: ConnectParams): Promise<OperationResult<ConnectData>> {
    return this.run('connect', async () => {
      const target = validateTarget(params);
      const timeoutMs =
        params.timeout === undefined ? this.defaultTimeoutMs : validateTimeout(params.timeout);

      const { connection, reused } = await this.pool.lease(target, timeoutMs);
      logger.info(`${reused ? 'Reusing' : 'Opened'} connection ${connection.key}`, {
        unitId: target.unitId,
      });

      let probe: ProbeStatus = 'skipped';
      let probeDetail: string | null = null;
      if (params.probe !== false) {
        try {
          const pdu = buildReadHoldingRegistersRequest(0, 1);
          parseReadHoldingRegistersResponse(
            await connection.exchange(target.unitId, pdu, timeoutMs),
            1
          );
          probe = 'responding';
          probeDetail = 'Holding register 0 read successfully';
        } catch (err: unknown) {
          if (err instanceof ModbusExceptionError) {
            probe = 'exception';
            probeDetail = `Device answered with ${err.exceptionName}; the connection is usable`;
          } else {
            probe = 'unverified';
            probeDetail = toErrorDetail(err).message;
          }
        }
      }

      return {
        ...target,
        key: connection.key,
        reused,
        state: connection.state,
        probe,
        probeDetail,
      };
    });
  }

  async readRegisters(params: ReadRegistersParams): Promise<OperationResult<ReadRegistersData>> {
    return this.run('read_registers', async () => {
      const target = validateTarget(params);
      const registerClass = validateRegisterClass(params.registerType);
      const dataType = validateDataType(params.dataType, registerClass);
      const startAddress = validateAddress(params.startAddress, 'start_address');
      const bits = isBitClass(registerClass);
      const width = registerWidth(dataType);
      const count = validateCount(
        params.count,
        bits ? MAX_READ_BITS : Math.floor(MAX_READ_REGISTERS / width),
        'count'
      );
      const plan: RegisterReadPlan = {
        functionCode: READ_FUNCTION_CODES[registerClass],
        quantity: bits ? count : count * width,
      };
      validateSpan(startAddress, plan.quantity, 'count');

      const connection = await this.connection(target);
      const { values, raw } = await this.readTable(
        connection,
        target.unitId,
        registerClass,
        dataType,
        startAddress,
        plan.quantity
      );

      logger.debug('Read completed', {
        unitId: target.unitId,
        funcCode: plan.functionCode,
        address: startAddress,
        quantity: plan.quantity,
      });

      return {
        ...target,
        registerType: registerClass,
        dataType: bits ? DataType.BOOL : dataType,
        functionCode: plan.functionCode,
        startAddress,
        count,
        quantity: plan.quantity,
        values,
        raw,
      };
    });
  }

  private async readTable(
    connection: ModbusConnection,
    unitId: number,
    registerClass: RegisterClass,
    dataType: DataType,
    startAddress: number,
    quantity: number
  ): Promise<{ values: RegisterValue[]; raw: number[] }> {
    switch (registerClass) {
      case RegisterClass.COIL: {
        const response = await connection.exchange(
          unitId,
          buildReadCoilsRequest(startAddress, quantity)
        );
        const bits = parseReadCoilsResponse(response, quantity);
        return { values: bits, raw: bits.map(bit => (bit ? 1 : 0)) };
      }
      case RegisterClass.DISCRETE: {
        const response = await connection.exchange(
          unitId,
          buildReadDiscreteInputsRequest(startAddress, quantity)
        );
        const bits = parseReadDiscreteInputsResponse(response, quantity);
        return { values: bits, raw: bits.map(bit => (bit ? 1 : 0)) };
      }
      case RegisterClass.HOLDING: {
        const response = await connection.exchange(
          unitId,
          buildReadHoldingRegistersRequest(startAddress, quantity)
        );
        const registers = parseReadHoldingRegistersResponse(response, quantity);
        return { values: decodeRegisters(registers, dataType), raw: registers };
      }
      case RegisterClass.INPUT: {
        const response = await connection.exchange(
          unitId,
          buildReadInputRegistersRequest(startAddress, quantity)
        );
        const registers = parseReadInputRegistersResponse(response, quantity);
        return { values: decodeRegisters(registers, dataType), raw: registers };
      }
    }
  }

  /**
   * Writes one value: FC5 for a coil, FC6 for a one-register holding value,
   * FC16 with quantity 2 for a 32-bit holding value.
   */
  async writeRegister(params: WriteRegisterParams): Promise<OperationResult<WriteRegisterData>> {
    return this.run('write_register', async () => {
      const registerClass = validateWritableClass(params.registerType ?? RegisterClass.HOLDING);
      const target = validateTarget(params);
      const dataType = validateDataType(params.dataType, registerClass);
      const address = validateAddress(params.address, 'address');

      if (registerClass === RegisterClass.COIL) {
        const state = encodeCoil(params.value);
        const connection = await this.connection(target);
        const echo = parseWriteSingleCoilResponse(
          await connection.exchange(target.unitId, buildWriteSingleCoilRequest(address, state))
        );
        this.checkEcho(echo.address, address, echo.value === state);
        return {
          ...target,
          registerType: registerClass,
          dataType: DataType.BOOL,
          functionCode: ModbusFunctionCode.WRITE_SINGLE_COIL,
          address,
          value: state,
          registers: [state ? 1 : 0],
        };
      }

      const registers = encodeValue(params.value, dataType);
      validateSpan(address, registers.length, 'address');
      const connection = await this.connection(target);

      let functionCode: ModbusFunctionCode;
      if (registers.length === 1) {
        functionCode = ModbusFunctionCode.WRITE_SINGLE_REGISTER;
        const echo = parseWriteSingleRegisterResponse(
          await connection.exchange(
            target.unitId,
            buildWriteSingleRegisterRequest(address, registers[0])
          )
        );
        this.checkEcho(echo.address, address, echo.value === registers[0]);
      } else {
        functionCode = ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
        const echo = parseWriteMultipleRegistersResponse(
          await connection.exchange(
            target.unitId,
            buildWriteMultipleRegistersRequest(address, registers)
          )
        );
        this.checkEcho(echo.startAddress, address, echo.quantity === registers.length);
      }

      logger.info('Write completed', { unitId: target.unitId, funcCode: functionCode, address });

      return {
        ...target,
        registerType: registerClass,
        dataType,
        functionCode,
        address,
        value: params.value,
        registers,
      };
    });
  }

  async writeMultipleRegisters(
    params: WriteMultipleRegistersParams
  ): Promise<OperationResult<WriteMultipleRegistersData>> {
    return this.run('write_multiple_registers', async () => {
      const registerClass = validateWritableClass(params.registerType ?? RegisterClass.HOLDING);
      const target = validateTarget(params);
      const dataType = validateDataType(params.dataType, registerClass);
      const startAddress = validateAddress(params.startAddress, 'start_address');
      if (!Array.isArray(params.values)) {
        throw new ModbusValidationError('values', 'Values must be an array');
      }

      if (registerClass === RegisterClass.COIL) {
        const count = validateCount(params.values.length, MAX_WRITE_COILS, 'values');
        validateSpan(startAddress, count, 'values');
        const states = params.values.map((value, i) => encodeCoil(value, `values[${i}]`));
        const connection = await this.connection(target);
        const echo = parseWriteMultipleCoilsResponse(
          await connection.exchange(
            target.unitId,
            buildWriteMultipleCoilsRequest(startAddress, states)
          )
        );
        this.checkEcho(echo.startAddress, startAddress, echo.quantity === count);
        return {
          ...target,
          registerType: registerClass,
          dataType: DataType.BOOL,
          functionCode: ModbusFunctionCode.WRITE_MULTIPLE_COILS,
          startAddress,
          count,
          quantity: count,
          values: states,
        };
      }

      const width = registerWidth(dataType);
      validateCount(params.values.length, MAX_WRITE_REGISTERS, 'values');
      const count = validateCount(
        params.values.length,
        Math.floor(MAX_WRITE_REGISTERS / width),
        'values'
      );
      const registers = encodeValues(params.values, dataType);
      validateSpan(startAddress, registers.length, 'values');

      const connection = await this.connection(target);
      const echo = parseWriteMultipleRegistersResponse(
        await connection.exchange(
          target.unitId,
          buildWriteMultipleRegistersRequest(startAddress, registers)
        )
      );
      this.checkEcho(echo.startAddress, startAddress, echo.quantity === registers.length);

      logger.info('Multiple write completed', {
        unitId: target.unitId,
        funcCode: ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS,
        address: startAddress,
        quantity: registers.length,
      });

      return {
        ...target,
        registerType: registerClass,
        dataType,
        functionCode: ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS,
        startAddress,
        count,
        quantity: registers.length,
        values: params.values,
      };
    });
  }

  private checkEcho(echoAddress: number, address: number, payloadMatches: boolean): void {
    if (echoAddress !== address || !payloadMatches) {
      throw new ModbusMalformedFrameError(
        `write echo does not match the request (address ${echoAddress}, expected ${address})`
      );
    }
  }

  /**
   * Reads the identification objects over as many FC43 pages as the device
   * announces. Illegal Function and Illegal Data Address answers mean the
   * device does not implement it.
   */
  async deviceInfo(params: DeviceInfoParams): Promise<OperationResult<DeviceInfoData>> {
    return this.run('device_info', async () => {
      const target = validateTarget(params);
      const level = params.level ?? 'basic';
      if (!isReadDeviceIdLevel(level)) {
        throw new ModbusValidationError('level', `Level must be basic, regular or extended, got ${String(level)}`);
      }
      const readDeviceIdCode = READ_DEVICE_ID_CODES[level];
      const connection = await this.connection(target);

      const objects: Record<string, string> = {};
      let conformityLevel = 0;
      let objectId = 0;

      try {
        for (let round = 0; round < MAX_DEVICE_ID_ROUNDS; round++) {
          const page = parseReadDeviceIdentificationResponse(
            await connection.exchange(
              target.unitId,
              buildReadDeviceIdentificationRequest(readDeviceIdCode, objectId)
            )
          );
          conformityLevel = page.conformityLevel;
          for (const [id, value] of Object.entries(page.objects)) {
            objects[deviceIdObjectName(Number(id))] = value;
          }
          if (!page.moreFollows || page.nextObjectId <= objectId) break;
          objectId = page.nextObjectId;
        }
      } catch (err: unknown) {
        if (
          err instanceof ModbusExceptionError &&
          (err.exceptionCode === ModbusExceptionCode.ILLEGAL_FUNCTION ||
            err.exceptionCode === ModbusExceptionCode.ILLEGAL_DATA_ADDRESS)
        ) {
          throw new ModbusNotSupportedError(err.functionCode, err.exceptionCode);
        }
        throw err;
      }

      return { ...target, level, conformityLevel, objects };
    });
  }

  /**
   * Runs connection, latency and test-read checks and reports each one.
   * Check failures never turn into a failed outcome.
   */
  async diagnostics(params: DiagnosticsParams): Promise<OperationResult<DiagnosticsData>> {
    return this.run('diagnostics', async () => {
      const target = validateTarget(params);
      const testRead = params.testRead ?? true;
      const testAddress = validateAddress(params.testAddress ?? 0, 'test_address');
      const testRegisterType = validateRegisterClass(
        params.testRegisterType ?? RegisterClass.HOLDING,
        'test_register_type'
      );
      const key = ConnectionPool.keyOf(target);
      const startedAt = Date.now();
      const checks: DiagnosticCheck[] = [];

      let connection: ModbusConnection | null = null;
      const connectStart = Date.now();
      try {
        const lease = await this.pool.lease(target, this.defaultTimeoutMs);
        connection = lease.connection;
        checks.push({
          name: 'connection',
          status: 'pass',
          latencyMs: Date.now() - connectStart,
          detail: lease.reused ? `Reused open connection to ${key}` : `Opened connection to ${key}`,
        });
      } catch (err: unknown) {
        checks.push({
          name: 'connection',
          status: 'fail',
          latencyMs: Date.now() - connectStart,
          detail: toErrorDetail(err).message,
        });
      }

      if (connection) {
        checks.push(await this.latencyCheck(connection, target.unitId));
        checks.push(
          testRead
            ? await this.testReadCheck(target, testRegisterType, testAddress)
            : { name: 'test_read', status: 'skipped', latencyMs: null, detail: 'Test read disabled' }
        );
      } else {
        checks.push(
          { name: 'latency', status: 'skipped', latencyMs: null, detail: 'No connection' },
          { name: 'test_read', status: 'skipped', latencyMs: null, detail: 'No connection' }
        );
      }

      const current = this.pool.status().find(entry => entry.key === key);
      const passed = checks.every(check => check.status === 'pass' || check.status === 'skipped');
      logger.info(`Diagnostics for ${key} ${passed ? 'passed' : 'reported problems'}`, {
        unitId: target.unitId,
      });

      return {
        ...target,
        passed: passed && checks[0].status === 'pass',
        elapsedMs: Date.now() - startedAt,
        state: current?.state ?? ConnectionState.Disconnected,
        checks,
        stats: connection?.stats ?? null,
      };
    });
  }

  private async latencyCheck(connection: ModbusConnection, unitId: number): Promise<DiagnosticCheck> {
    const start = Date.now();
    try {
      await connection.exchange(unitId, buildReadHoldingRegistersRequest(0, 1));
      return {
        name: 'latency',
        status: 'pass',
        latencyMs: Date.now() - start,
        detail: 'Round trip completed',
      };
    } catch (err: unknown) {
      const latencyMs = Date.now() - start;
      if (err instanceof ModbusExceptionError) {
        return {
          name: 'latency',
          status: 'pass',
          latencyMs,
          detail: `Round trip completed (device answered ${err.exceptionName})`,
        };
      }
      return { name: 'latency', status: 'fail', latencyMs, detail: toErrorDetail(err).message };
    }
  }

  private async testReadCheck(
    target: DeviceTarget,
    registerClass: RegisterClass,
    address: number
  ): Promise<DiagnosticCheck> {
    const start = Date.now();
    let status: CheckStatus;
    let detail: string;
    try {
      const connection = await this.connection(target);
      const { values } = await this.readTable(
        connection,
        target.unitId,
        registerClass,
        DataType.UINT16,
        address,
        1
      );
      status = 'pass';
      detail = `${registerClass} ${address} = ${String(values[0])}`;
    } catch (err: unknown) {
      status = err instanceof ModbusExceptionError ? 'partial' : 'fail';
      detail = toErrorDetail(err).message;
    }
    return { name: 'test_read', status, latencyMs: Date.now() - start, detail };
  }

  async disconnect(params: DisconnectParams): Promise<OperationResult<DisconnectData>> {
    return this.run('disconnect', async () => {
      const endpoint = validateEndpoint(params);
      const disconnected = await this.pool.release(endpoint);
      return { ...endpoint, key: ConnectionPool.keyOf(endpoint), disconnected };
    });
  }
}
