// src/connection/connection-pool.ts

import { Mutex } from 'async-mutex';
import { ModbusConnection } from './modbus-connection.js';
import { logManager } from '../logger.js';
import { ModbusNotConnectedError } from '../errors.js';
import {
  DeviceKey,
  ModbusConnectionOptions,
  PooledConnectionStatus,
  TransportFactory,
} from '../types/modbus-types.js';

const logger = logManager.createLogger('ConnectionPool');

export type ConnectionFactory = (
  host: string,
  port: number,
  options: ModbusConnectionOptions
) => ModbusConnection;

export interface ConnectionPoolOptions {
  /** Connect timeout used when a caller gives none, ms */
  connectTimeout?: number;
  /** Per-transaction deadline of pooled connections, ms */
  requestTimeout?: number;
  connectionFactory?: ConnectionFactory;
  transportFactory?: TransportFactory;
}

export interface ConnectionLease {
  connection: ModbusConnection;
  /** false when the connection was opened by this call */
  reused: boolean;
}

type Endpoint = Pick<DeviceKey, 'host' | 'port'>;

const defaultConnectionFactory: ConnectionFactory = (host, port, options) =>
  new ModbusConnection(host, port, options);

/**
 * Registry of open connections, at most one per host:port. Unit ids share the
 * socket of their endpoint and travel with each request.
 */
export class ConnectionPool {
  private readonly connections: Map<string, ModbusConnection> = new Map();
  private readonly locks: Map<string, Mutex> = new Map();
  private readonly options: ConnectionPoolOptions;
  private readonly factory: ConnectionFactory;

  constructor(options: ConnectionPoolOptions = {}) {
    this.options = options;
    this.factory = options.connectionFactory ?? defaultConnectionFactory;
  }

  static keyOf(endpoint: Endpoint): string {
    return `${endpoint.host}:${endpoint.port}`;
  }

  get size(): number {
    return this.connections.size;
  }

  /** Endpoints holding a connection or a pending pool operation */
  get trackedKeys(): number {
    return this.locks.size;
  }

  /**
   * Runs `task` under the endpoint's lock. The lock is dropped again once no
   * connection and no waiter needs it.
   */
  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    try {
      return await lock.runExclusive(task);
    } finally {
      if (!lock.isLocked() && !this.connections.has(key) && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Returns the live connection for the endpoint, replacing a faulted one and
   * opening a new one when none exists. Atomic per key.
   */
  async lease(endpoint: Endpoint, connectTimeout?: number): Promise<ConnectionLease> {
    const key = ConnectionPool.keyOf(endpoint);

    return this.withLock(key, async () => {
      const existing = this.connections.get(key);
      if (existing?.isAlive()) {
        return { connection: existing, reused: true };
      }
      if (existing) {
        logger.info(`Replacing ${existing.state} connection ${key}`);
        this.connections.delete(key);
        await this.closeConnection(existing);
      }

      const connection = this.factory(endpoint.host, endpoint.port, {
        connectTimeout: connectTimeout ?? this.options.connectTimeout,
        requestTimeout: this.options.requestTimeout,
        transportFactory: this.options.transportFactory,
      });
      await connection.open();
      this.connections.set(key, connection);
      logger.info(`Opened connection ${key}`, { pooled: this.connections.size });
      return { connection, reused: false };
    });
  }

  async getOrCreate(endpoint: Endpoint, connectTimeout?: number): Promise<ModbusConnection> {
    const { connection } = await this.lease(endpoint, connectTimeout);
    return connection;
  }

  /**
   * The live connection for the endpoint; never opens one.
   * @throws ModbusNotConnectedError
   */
  acquire(endpoint: Endpoint): ModbusConnection {
    const key = ConnectionPool.keyOf(endpoint);
    const connection = this.connections.get(key);
    if (!connection?.isAlive()) {
      throw new ModbusNotConnectedError(key);
    }
    return connection;
  }

  /**
   * Closes and forgets the endpoint's connection.
   * @returns whether there was one
   */
  async release(endpoint: Endpoint): Promise<boolean> {
    const key = ConnectionPool.keyOf(endpoint);

    return this.withLock(key, async () => {
      const connection = this.connections.get(key);
      if (!connection) return false;
      this.connections.delete(key);
      await this.closeConnection(connection);
      logger.info(`Released connection ${key}`, { pooled: this.connections.size });
      return true;
    });
  }

  async closeAll(): Promise<void> {
    const endpoints = [...this.connections.values()].map(({ host, port }) => ({ host, port }));
    logger.info(`Closing ${endpoints.length} pooled connection(s)`);
    await Promise.all(endpoints.map(endpoint => this.release(endpoint)));
  }

  status(): PooledConnectionStatus[] {
    return [...this.connections.entries()].map(([key, connection]) => ({
      key,
      host: connection.host,
      port: connection.port,
      state: connection.state,
      lastUsed: connection.lastUsed,
    }));
  }

  private async closeConnection(connection: ModbusConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err: unknown) {
      logger.warn(`Error closing connection ${connection.key}`, err);
    }
  }
}
