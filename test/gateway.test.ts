import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConnectionPool } from '../src/connection/connection-pool.js';
import { ModbusGateway } from '../src/gateway.js';
import { ModbusFunctionCode } from '../src/constants/constants.js';
import { ErrorDetail } from '../src/errors.js';
import { OperationResult } from '../src/types/gateway-types.js';
import { DeviceSimulator, startSimulator } from './helpers/device-simulator.js';

function unwrap<T>(result: OperationResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

function failure<T>(result: OperationResult<T>): ErrorDetail {
  if (result.success) {
    throw new Error('Expected a failed outcome');
  }
  return result.error;
}

describe('ModbusGateway', () => {
  let simulator: DeviceSimulator;
  let pool: ConnectionPool;
  let gateway: ModbusGateway;
  let host: string;
  let port: number;

  beforeEach(async () => {
    simulator = await startSimulator();
    pool = new ConnectionPool({ connectTimeout: 1000, requestTimeout: 300 });
    gateway = new ModbusGateway(pool, { defaultTimeout: 1 });
    host = '127.0.0.1';
    port = simulator.port;
  });

  afterEach(async () => {
    await pool.closeAll();
    await simulator.stop();
  });

  it('writes 1500 to holding register 100 and reads it back', async () => {
    unwrap(await gateway.connect({ host, port }));
    unwrap(await gateway.writeRegister({ host, port, address: 100, value: 1500 }));
    const read = unwrap(
      await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 100, count: 1 })
    );

    expect(read.values).toEqual([1500]);
    expect(read.raw).toEqual([1500]);
    expect(simulator.connectionCount).toBe(1);
  });

  describe('connect', () => {
    it('opens the pooled connection and probes holding register 0', async () => {
      const data = unwrap(await gateway.connect({ host, port }));

      expect(data).toEqual({
        host,
        port,
        unitId: 1,
        key: `${host}:${port}`,
        reused: false,
        state: 'connected',
        probe: 'responding',
        probeDetail: 'Holding register 0 read successfully',
      });
    });

    it('reuses an open connection', async () => {
      unwrap(await gateway.connect({ host, port }));
      const data = unwrap(await gateway.connect({ host, port, probe: false }));

      expect(data.reused).toBe(true);
      expect(data.probe).toBe('skipped');
      expect(simulator.connectionCount).toBe(1);
    });

    it('still connects when the probe answers with an exception', async () => {
      simulator.setException(ModbusFunctionCode.READ_HOLDING_REGISTERS, 0, 2);
      const data = unwrap(await gateway.connect({ host, port }));

      expect(data.probe).toBe('exception');
      expect(data.probeDetail).toBe(
        'Device answered with Illegal Data Address; the connection is usable'
      );
      expect(data.state).toBe('connected');
    });

    it('reports a refused connection', async () => {
      await simulator.stop();
      const error = failure(await gateway.connect({ host, port }));

      expect(error.kind).toBe('connection');
      expect(error.message).toBe(`Connection refused to ${host}:${port}`);
    });

    it('validates the timeout before connecting', async () => {
      const error = failure(await gateway.connect({ host, port, timeout: 0 }));

      expect(error.kind).toBe('validation');
      expect(error.parameter).toBe('timeout');
      expect(simulator.connectionCount).toBe(0);
    });

    it('rejects an empty host, a bad port and a bad unit id', async () => {
      expect(failure(await gateway.connect({ host: '  ' })).parameter).toBe('host');
      expect(failure(await gateway.connect({ host, port: 70000 })).parameter).toBe('port');
      expect(failure(await gateway.connect({ host, port, unitId: 256 })).parameter).toBe('unit_id');
    });
  });

  describe('readRegisters', () => {
    it('accepts 125 uint16 values and rejects 126 without touching the socket', async () => {
      const ok = unwrap(
        await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 0, count: 125 })
      );
      expect(ok.values).toHaveLength(125);

      const requestsBefore = simulator.requests.length;
      const error = failure(
        await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 0, count: 126 })
      );
      expect(error).toEqual({
        kind: 'validation',
        message: 'Invalid quantity: 126. Must be between 1-125.',
        parameter: 'count',
      });
      expect(simulator.requests).toHaveLength(requestsBefore);
    });

    it('halves the value ceiling for 32-bit types', async () => {
      const error = failure(
        await gateway.readRegisters({
          host,
          port,
          registerType: 'holding',
          startAddress: 0,
          count: 63,
          dataType: 'float32',
        })
      );

      expect(error.message).toBe('Invalid quantity: 63. Must be between 1-62.');
      expect(simulator.connectionCount).toBe(0);
    });

    it('decodes float32 from two registers', async () => {
      simulator.holdingRegisters.set(10, 0x3fc0);
      simulator.holdingRegisters.set(11, 0x0000);
      const data = unwrap(
        await gateway.readRegisters({
          host,
          port,
          registerType: 'holding',
          startAddress: 10,
          count: 1,
          dataType: 'float32',
        })
      );

      expect(data.values).toEqual([1.5]);
      expect(data.quantity).toBe(2);
      expect(data.raw).toEqual([0x3fc0, 0]);
      expect(data.functionCode).toBe(0x03);
    });

    it('reads signed input registers with FC4', async () => {
      simulator.inputRegisters.set(0, 0xffff);
      const data = unwrap(
        await gateway.readRegisters({
          host,
          port,
          registerType: 'input',
          startAddress: 0,
          count: 1,
          dataType: 'int16',
        })
      );

      expect(data.values).toEqual([-1]);
      expect(data.functionCode).toBe(0x04);
    });

    it('reads coils as bits', async () => {
      simulator.coils.set(0, true);
      simulator.coils.set(2, true);
      const data = unwrap(
        await gateway.readRegisters({ host, port, registerType: 'coil', startAddress: 0, count: 3 })
      );

      expect(data.values).toEqual([true, false, true]);
      expect(data.raw).toEqual([1, 0, 1]);
      expect(data.dataType).toBe('bool');
      expect(data.functionCode).toBe(0x01);
    });

    it('reads discrete inputs with FC2', async () => {
      simulator.discreteInputs.set(4, true);
      const data = unwrap(
        await gateway.readRegisters({ host, port, registerType: 'discrete', startAddress: 4, count: 1 })
      );

      expect(data.values).toEqual([true]);
      expect(simulator.requestsFor(ModbusFunctionCode.READ_DISCRETE_INPUTS)).toHaveLength(1);
    });

    it('refuses 32-bit types on coils', async () => {
      const error = failure(
        await gateway.readRegisters({
          host,
          port,
          registerType: 'coil',
          startAddress: 0,
          count: 1,
          dataType: 'uint32',
        })
      );

      expect(error.kind).toBe('invalid_operation');
      expect(error.parameter).toBe('data_type');
    });

    it('rejects unknown register and data types', async () => {
      const badClass = failure(
        await gateway.readRegisters({ host, port, registerType: 'memory', startAddress: 0, count: 1 })
      );
      expect(badClass.kind).toBe('validation');
      expect(badClass.parameter).toBe('register_type');

      const badType = failure(
        await gateway.readRegisters({
          host,
          port,
          registerType: 'holding',
          startAddress: 0,
          count: 1,
          dataType: 'float64',
        })
      );
      expect(badType.kind).toBe('encoding');
      expect(badType.parameter).toBe('data_type');
    });

    it('rejects a range past address 65535', async () => {
      const error = failure(
        await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 65535, count: 2 })
      );

      expect(error.message).toBe('Range 65535..65536 runs past the last address 65535');
      expect(error.parameter).toBe('count');
    });

    it('surfaces device exceptions with their code', async () => {
      simulator.setException(ModbusFunctionCode.READ_HOLDING_REGISTERS, 50, 2);
      const error = failure(
        await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 50, count: 1 })
      );

      expect(error.kind).toBe('device_exception');
      expect(error.functionCode).toBe(0x03);
      expect(error.exceptionCode).toBe(2);
      expect(error.exceptionName).toBe('Illegal Data Address');
    });

    it('reports a timeout and reconnects on the next call', async () => {
      simulator.setHook(() => ({ silent: true }));
      const error = failure(
        await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 0, count: 1 })
      );
      expect(error.kind).toBe('timeout');

      simulator.setHook(null);
      unwrap(await gateway.readRegisters({ host, port, registerType: 'holding', startAddress: 0, count: 1 }));
      expect(simulator.connectionCount).toBe(2);
    });

    it('shares one socket between unit ids of an endpoint', async () => {
      const results = await Promise.all(
        [1, 2, 3].map(unitId =>
          gateway.readRegisters({ host, port, unitId, registerType: 'holding', startAddress: 0, count: 1 })
        )
      );

      expect(results.every(result => result.success)).toBe(true);
      expect(simulator.connectionCount).toBe(1);
      expect(simulator.requests.map(request => request.unitId).sort()).toEqual([1, 2, 3]);
    });
  });

  describe('writeRegister', () => {
    it('refuses read-only tables before any I/O', async () => {
      for (const registerType of ['input', 'discrete']) {
        const error = failure(
          await gateway.writeRegister({ host, port, address: 0, value: 1, registerType })
        );
        expect(error.kind).toBe('read_only');
        expect(error.parameter).toBe('register_type');
      }
      expect(simulator.connectionCount).toBe(0);
    });

    it('writes a 32-bit value with FC16', async () => {
      const data = unwrap(
        await gateway.writeRegister({ host, port, address: 20, value: 65536, dataType: 'uint32' })
      );

      expect(data.functionCode).toBe(0x10);
      expect(data.registers).toEqual([1, 0]);
      expect(simulator.holdingRegisters.get(20)).toBe(1);
      expect(simulator.holdingRegisters.get(21)).toBe(0);
    });

    it('writes int16 as two\'s complement with FC6', async () => {
      const data = unwrap(
        await gateway.writeRegister({ host, port, address: 0, value: -5, dataType: 'int16' })
      );

      expect(data.functionCode).toBe(0x06);
      expect(simulator.holdingRegisters.get(0)).toBe(0xfffb);
    });

    it('writes a coil with FC5', async () => {
      const data = unwrap(
        await gateway.writeRegister({ host, port, address: 3, value: true, registerType: 'coil' })
      );

      expect(data.functionCode).toBe(0x05);
      expect(data.value).toBe(true);
      expect(simulator.coils.get(3)).toBe(true);
    });

    it('rejects a value the data type cannot hold', async () => {
      const error = failure(await gateway.writeRegister({ host, port, address: 0, value: 70000 }));

      expect(error).toEqual({
        kind: 'encoding',
        message: 'Value 70000 out of range for uint16 (0..65535)',
        parameter: 'value',
      });
      expect(simulator.connectionCount).toBe(0);
    });

    it('rejects coil values other than booleans and 0/1', async () => {
      const error = failure(
        await gateway.writeRegister({ host, port, address: 0, value: 2, registerType: 'coil' })
      );
      expect(error.kind).toBe('encoding');
    });
  });

  describe('writeMultipleRegisters', () => {
    it('accepts 123 holding values and rejects 124', async () => {
      const values = Array.from({ length: 124 }, (_, i) => i);
      const ok = unwrap(
        await gateway.writeMultipleRegisters({ host, port, startAddress: 0, values: values.slice(0, 123) })
      );
      expect(ok.quantity).toBe(123);
      expect(simulator.holdingRegisters.get(122)).toBe(122);

      const error = failure(await gateway.writeMultipleRegisters({ host, port, startAddress: 0, values }));
      expect(error.message).toBe('Invalid quantity: 124. Must be between 1-123.');
      expect(error.parameter).toBe('values');
    });

    it('limits 32-bit values to the FC16 register budget', async () => {
      const values = new Array<number>(62).fill(1);
      const error = failure(
        await gateway.writeMultipleRegisters({ host, port, startAddress: 0, values, dataType: 'float32' })
      );

      expect(error.message).toBe('Invalid quantity: 62. Must be between 1-61.');
    });

    it('rejects an empty list', async () => {
      const error = failure(await gateway.writeMultipleRegisters({ host, port, startAddress: 0, values: [] }));
      expect(error.message).toBe('Invalid quantity: 0. Must be between 1-123.');
    });

    it('writes coils with FC15', async () => {
      const data = unwrap(
        await gateway.writeMultipleRegisters({
          host,
          port,
          startAddress: 8,
          values: [true, false, 1],
          registerType: 'coil',
        })
      );

      expect(data.functionCode).toBe(0x0f);
      expect(data.values).toEqual([true, false, true]);
      expect([8, 9, 10].map(address => simulator.coils.get(address))).toEqual([true, false, true]);
    });

    it('writes 32-bit values high word first', async () => {
      const data = unwrap(
        await gateway.writeMultipleRegisters({
          host,
          port,
          startAddress: 0,
          values: [0x12345678, 2],
          dataType: 'uint32',
        })
      );

      expect(data.count).toBe(2);
      expect(data.quantity).toBe(4);
      expect([0, 1, 2, 3].map(address => simulator.holdingRegisters.get(address))).toEqual([
        0x1234, 0x5678, 0, 2,
      ]);
    });

    it('rejects fractions for integer types and names the index', async () => {
      const error = failure(
        await gateway.writeMultipleRegisters({
          host,
          port,
          startAddress: 0,
          values: [1, 1.5],
          dataType: 'uint32',
        })
      );

      expect(error.kind).toBe('encoding');
      expect(error.parameter).toBe('values[1]');
    });
  });

  describe('deviceInfo', () => {
    it('collects objects over several pages', async () => {
      simulator.deviceId.set(0, 'ACME');
      simulator.deviceId.set(1, 'GW-100');
      simulator.deviceId.set(2, 'v1.2');
      simulator.deviceId.set(3, 'http://example.com');
      simulator.deviceId.set(4, 'Gateway');

      const data = unwrap(await gateway.deviceInfo({ host, port }));

      expect(data.level).toBe('basic');
      expect(data.conformityLevel).toBe(0x81);
      expect(data.objects).toEqual({
        vendorName: 'ACME',
        productCode: 'GW-100',
        majorMinorRevision: 'v1.2',
        vendorUrl: 'http://example.com',
        productName: 'Gateway',
      });
      const requests = simulator.requestsFor(ModbusFunctionCode.READ_DEVICE_IDENTIFICATION);
      expect(requests.map(request => request.pdu[3])).toEqual([0, 3]);
    });

    it('sends the requested category', async () => {
      simulator.deviceId.set(0x80, 'custom');
      const data = unwrap(await gateway.deviceInfo({ host, port, level: 'extended' }));

      expect(data.objects).toEqual({ object_0x80: 'custom' });
      expect(simulator.requests[0].pdu[2]).toBe(3);
    });

    it('maps Illegal Function to not supported', async () => {
      simulator.deviceIdSupported = false;
      const error = failure(await gateway.deviceInfo({ host, port }));

      expect(error.kind).toBe('not_supported');
      expect(error.exceptionCode).toBe(1);
      expect(error.message).toBe('Function 0x2b is not supported by the device (Illegal Function)');
    });

    it('keeps other exceptions as device exceptions', async () => {
      // MEI type and category sit where read requests carry the address
      simulator.setException(ModbusFunctionCode.READ_DEVICE_IDENTIFICATION, 0x0e01, 4);
      const error = failure(await gateway.deviceInfo({ host, port }));

      expect(error.kind).toBe('device_exception');
      expect(error.exceptionName).toBe('Slave Device Failure');
    });
  });

  describe('diagnostics', () => {
    it('passes every check against a healthy device', async () => {
      const data = unwrap(await gateway.diagnostics({ host, port }));

      expect(data.passed).toBe(true);
      expect(data.checks.map(check => [check.name, check.status])).toEqual([
        ['connection', 'pass'],
        ['latency', 'pass'],
        ['test_read', 'pass'],
      ]);
      expect(data.checks[0].detail).toBe(`Opened connection to ${host}:${port}`);
      expect(data.checks[2].detail).toBe('holding 0 = 0');
      expect(data.state).toBe('connected');
      expect(data.stats?.successfulResponses).toBe(2);
      expect(data.stats?.errorRate).toBe(0);
    });

    it('marks a test read exception as partial', async () => {
      simulator.setException(ModbusFunctionCode.READ_INPUT_REGISTERS, 7, 2);
      const data = unwrap(
        await gateway.diagnostics({ host, port, testAddress: 7, testRegisterType: 'input' })
      );

      expect(data.checks[2].status).toBe('partial');
      expect(data.passed).toBe(false);
      expect(data.stats?.errorRate).toBe(50);
    });

    it('skips the test read when disabled', async () => {
      const data = unwrap(await gateway.diagnostics({ host, port, testRead: false }));

      expect(data.checks[2]).toEqual({
        name: 'test_read',
        status: 'skipped',
        latencyMs: null,
        detail: 'Test read disabled',
      });
      expect(data.passed).toBe(true);
    });

    it('reports a failed connection instead of failing', async () => {
      await simulator.stop();
      const data = unwrap(await gateway.diagnostics({ host, port }));

      expect(data.passed).toBe(false);
      expect(data.checks.map(check => check.status)).toEqual(['fail', 'skipped', 'skipped']);
      expect(data.state).toBe('disconnected');
      expect(data.stats).toBeNull();
    });
  });

  describe('disconnect', () => {
    it('closes the pooled connection once', async () => {
      unwrap(await gateway.connect({ host, port }));

      expect(unwrap(await gateway.disconnect({ host, port }))).toEqual({
        host,
        port,
        key: `${host}:${port}`,
        disconnected: true,
      });
      expect(unwrap(await gateway.disconnect({ host, port })).disconnected).toBe(false);
      expect(pool.size).toBe(0);
    });
  });
});
