import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ModbusConnection } from '../src/connection/modbus-connection.js';
import { ConnectionState } from '../src/types/modbus-types.js';
import {
  ModbusConnectionRefusedError,
  ModbusExceptionError,
  ModbusNotConnectedError,
  ModbusTimeoutError,
  ModbusUnitIdMismatchError,
} from '../src/errors.js';
import { buildReadHoldingRegistersRequest } from '../src/function-codes/read-holding-registers.js';
import { DeviceSimulator, startSimulator } from './helpers/device-simulator.js';

describe('ModbusConnection', () => {
  let simulator: DeviceSimulator;
  let connection: ModbusConnection;

  beforeEach(async () => {
    simulator = await startSimulator();
    connection = new ModbusConnection('127.0.0.1', simulator.port, { requestTimeout: 1000 });
  });

  afterEach(async () => {
    await connection.close();
    await simulator.stop();
  });

  it('executes a request and returns the payload after the function code', async () => {
    simulator.holdingRegisters.set(100, 1500);
    await connection.open();

    const payload = await connection.execute(1, 0x03, Uint8Array.of(0x00, 0x64, 0x00, 0x01));

    expect([...payload]).toEqual([0x02, 0x05, 0xdc]);
    expect(connection.state).toBe(ConnectionState.Connected);
    expect(connection.isAlive()).toBe(true);
    expect(connection.key).toBe(`127.0.0.1:${simulator.port}`);
  });

  it('increments the transaction id per request and passes the unit id through', async () => {
    await connection.open();
    await connection.exchange(1, buildReadHoldingRegistersRequest(0, 1));
    await connection.exchange(7, buildReadHoldingRegistersRequest(0, 1));

    expect(simulator.requests.map(request => request.transactionId)).toEqual([1, 2]);
    expect(simulator.requests.map(request => request.unitId)).toEqual([1, 7]);
  });

  it('counts traffic', async () => {
    await connection.open();
    await connection.exchange(1, buildReadHoldingRegistersRequest(0, 1));

    const stats = connection.stats;
    expect(stats.totalRequests).toBe(1);
    expect(stats.successfulResponses).toBe(1);
    expect(stats.totalDataSent).toBe(12);
    expect(stats.totalDataReceived).toBe(11);
    expect(stats.functionCallCounts).toEqual({ READ_HOLDING_REGISTERS: 1 });
  });

  it('closes idempotently', async () => {
    await connection.open();
    await connection.close();
    await connection.close();

    expect(connection.state).toBe(ConnectionState.Disconnected);
    expect(connection.isAlive()).toBe(false);
  });

  it('does not send a request before the previous response arrived', async () => {
    simulator.holdingRegisters.set(0, 11);
    simulator.holdingRegisters.set(1, 22);
    const arrivals: number[] = [];
    simulator.setHook(request => {
      arrivals.push(Date.now());
      return request.index === 0 ? { delayMs: 100 } : undefined;
    });
    await connection.open();

    const [first, second] = await Promise.all([
      connection.exchange(1, buildReadHoldingRegistersRequest(0, 1)),
      connection.exchange(1, buildReadHoldingRegistersRequest(1, 1)),
    ]);

    expect([...first]).toEqual([0x03, 0x02, 0x00, 11]);
    expect([...second]).toEqual([0x03, 0x02, 0x00, 22]);
    expect(arrivals).toHaveLength(2);
    expect(arrivals[1] - arrivals[0]).toBeGreaterThanOrEqual(80);
  });

  it('keeps the connection after a device exception', async () => {
    simulator.setException(0x03, 5, 2);
    await connection.open();

    await expect(connection.exchange(1, buildReadHoldingRegistersRequest(5, 1))).rejects.toThrow(
      ModbusExceptionError
    );
    expect(connection.state).toBe(ConnectionState.Connected);
    expect(connection.stats.modbusExceptions).toBe(1);
    expect(connection.stats.exceptionCodeCounts).toEqual({ 2: 1 });
  });

  it('faults on timeout and discards the late answer', async () => {
    simulator.holdingRegisters.set(0, 111);
    simulator.holdingRegisters.set(1, 222);
    simulator.setHook(request => ({ delayMs: request.index === 0 ? 150 : 300 }));
    await connection.open();

    await expect(
      connection.exchange(1, buildReadHoldingRegistersRequest(0, 1), 50)
    ).rejects.toThrow(ModbusTimeoutError);
    expect(connection.state).toBe(ConnectionState.Faulted);
    expect(connection.isAlive()).toBe(false);

    // the answer to the first request arrives while this one is waiting
    const response = await connection.exchange(1, buildReadHoldingRegistersRequest(1, 1), 2000);

    expect([...response]).toEqual([0x03, 0x02, 0x00, 0xde]);
    expect(connection.stats.timeouts).toBe(1);
  });

  it('skips a late answer that arrives in two segments', async () => {
    simulator.holdingRegisters.set(0, 111);
    simulator.holdingRegisters.set(1, 222);
    simulator.setHook(request =>
      request.index === 0 ? { delayMs: 70, split: { at: 4, gapMs: 100 } } : { delayMs: 150 }
    );
    await connection.open();

    await expect(
      connection.exchange(1, buildReadHoldingRegistersRequest(0, 1), 50)
    ).rejects.toThrow(ModbusTimeoutError);
    // the first four bytes of the late answer are buffered before the next request
    await new Promise(resolve => setTimeout(resolve, 60));

    const response = await connection.exchange(1, buildReadHoldingRegistersRequest(1, 1), 2000);

    expect([...response]).toEqual([0x03, 0x02, 0x00, 0xde]);
    expect(simulator.requests.map(request => request.transactionId)).toEqual([1, 2]);
  });

  it('skips the rest of a frame whose header was read before the timeout', async () => {
    simulator.holdingRegisters.set(0, 111);
    simulator.holdingRegisters.set(1, 222);
    simulator.setHook(request =>
      request.index === 0 ? { split: { at: 9, gapMs: 100 } } : { delayMs: 150 }
    );
    await connection.open();

    await expect(
      connection.exchange(1, buildReadHoldingRegistersRequest(0, 1), 50)
    ).rejects.toThrow(ModbusTimeoutError);
    const response = await connection.exchange(1, buildReadHoldingRegistersRequest(1, 1), 2000);

    expect([...response]).toEqual([0x03, 0x02, 0x00, 0xde]);
  });

  it('faults on a frame from another unit', async () => {
    simulator.setHook(() => ({
      rewrite: adu => {
        adu[6] = 9;
        return adu;
      },
    }));
    await connection.open();

    await expect(connection.exchange(1, buildReadHoldingRegistersRequest(0, 1))).rejects.toThrow(
      ModbusUnitIdMismatchError
    );
    expect(connection.state).toBe(ConnectionState.Faulted);
    expect(connection.stats.frameErrors).toBe(1);
  });

  it('faults when the device closes the socket', async () => {
    await connection.open();
    simulator.dropConnections();

    await vi.waitFor(() => expect(connection.state).toBe(ConnectionState.Faulted));
    await expect(connection.exchange(1, buildReadHoldingRegistersRequest(0, 1))).rejects.toThrow(
      ModbusNotConnectedError
    );
  });

  it('reports a refused connection', async () => {
    const port = simulator.port;
    await simulator.stop();
    const refused = new ModbusConnection('127.0.0.1', port, { connectTimeout: 1000 });

    await expect(refused.open()).rejects.toThrow(ModbusConnectionRefusedError);
    expect(refused.state).toBe(ConnectionState.Disconnected);
  });
});
