import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionPool, ConnectionFactory } from '../src/connection/connection-pool.js';
import { ModbusConnection } from '../src/connection/modbus-connection.js';
import { ConnectionState } from '../src/types/modbus-types.js';
import { ModbusConnectionRefusedError, ModbusNotConnectedError } from '../src/errors.js';
import { DeviceSimulator, startSimulator } from './helpers/device-simulator.js';

describe('ConnectionPool', () => {
  let simulator: DeviceSimulator;
  let pool: ConnectionPool;
  let created: ModbusConnection[];

  beforeEach(async () => {
    simulator = await startSimulator();
    created = [];
    const connectionFactory: ConnectionFactory = (host, port, options) => {
      const connection = new ModbusConnection(host, port, options);
      created.push(connection);
      return connection;
    };
    pool = new ConnectionPool({ connectTimeout: 1000, requestTimeout: 1000, connectionFactory });
  });

  afterEach(async () => {
    await pool.closeAll();
    await simulator.stop();
  });

  const endpoint = (): { host: string; port: number } => ({ host: '127.0.0.1', port: simulator.port });

  it('opens exactly one connection for concurrent callers of one endpoint', async () => {
    const connections = await Promise.all(
      Array.from({ length: 5 }, () => pool.getOrCreate(endpoint()))
    );

    expect(created).toHaveLength(1);
    expect(new Set(connections).size).toBe(1);
    expect(pool.size).toBe(1);
    await vi.waitFor(() => expect(simulator.connectionCount).toBe(1));
  });

  it('reports whether a lease reused the connection', async () => {
    const first = await pool.lease(endpoint());
    const second = await pool.lease(endpoint());

    expect(first.reused).toBe(false);
    expect(second.reused).toBe(true);
    expect(second.connection).toBe(first.connection);
  });

  it('replaces a faulted connection', async () => {
    const original = await pool.getOrCreate(endpoint());
    simulator.dropConnections();
    await vi.waitFor(() => expect(original.state).toBe(ConnectionState.Faulted));

    const lease = await pool.lease(endpoint());

    expect(lease.reused).toBe(false);
    expect(lease.connection).not.toBe(original);
    expect(original.state).toBe(ConnectionState.Disconnected);
    expect(lease.connection.isAlive()).toBe(true);
    expect(pool.size).toBe(1);
  });

  it('acquires only live connections', async () => {
    expect(() => pool.acquire(endpoint())).toThrow(ModbusNotConnectedError);

    const connection = await pool.getOrCreate(endpoint());
    expect(pool.acquire(endpoint())).toBe(connection);
  });

  it('releases idempotently', async () => {
    const connection = await pool.getOrCreate(endpoint());

    expect(await pool.release(endpoint())).toBe(true);
    expect(await pool.release(endpoint())).toBe(false);
    expect(pool.size).toBe(0);
    expect(pool.trackedKeys).toBe(0);
    expect(connection.state).toBe(ConnectionState.Disconnected);
  });

  it('tracks an endpoint only while it has a connection', async () => {
    await Promise.all([pool.getOrCreate(endpoint()), pool.getOrCreate(endpoint())]);
    expect(pool.trackedKeys).toBe(1);

    await Promise.all([pool.release(endpoint()), pool.getOrCreate(endpoint())]);
    expect(pool.size).toBe(1);
    expect(pool.trackedKeys).toBe(1);

    await pool.closeAll();
    expect(pool.trackedKeys).toBe(0);
  });

  it('lists pooled connections', async () => {
    await pool.getOrCreate(endpoint());

    const [entry] = pool.status();
    expect(pool.status()).toHaveLength(1);
    expect(entry.key).toBe(`127.0.0.1:${simulator.port}`);
    expect(entry.port).toBe(simulator.port);
    expect(entry.state).toBe(ConnectionState.Connected);
    expect(entry.lastUsed).toBeGreaterThan(0);
  });

  it('keeps nothing when the connect fails', async () => {
    const port = simulator.port;
    await simulator.stop();

    await expect(pool.getOrCreate({ host: '127.0.0.1', port })).rejects.toThrow(
      ModbusConnectionRefusedError
    );
    expect(pool.size).toBe(0);
    expect(pool.trackedKeys).toBe(0);
  });

  it('closes every connection on teardown', async () => {
    const other = await startSimulator();
    try {
      const a = await pool.getOrCreate(endpoint());
      const b = await pool.getOrCreate({ host: '127.0.0.1', port: other.port });
      expect(pool.size).toBe(2);

      await pool.closeAll();

      expect(pool.size).toBe(0);
      expect(a.state).toBe(ConnectionState.Disconnected);
      expect(b.state).toBe(ConnectionState.Disconnected);
    } finally {
      await other.stop();
    }
  });
});
