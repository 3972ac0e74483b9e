#!/usr/bin/env node
// src/server.ts

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { ConnectionPool } from './connection/connection-pool.js';
import { ModbusGateway } from './gateway.js';
import { logManager } from './logger.js';
import { createMcpServer } from './mcp/mcp-server.js';

const SERVER_NAME = 'modbus-tcp-gateway';
const SERVER_VERSION = '1.0.0';

const logger = logManager.createLogger('McpServer');

async function main(): Promise<void> {
  const config = loadConfig();
  logManager.setLevel(config.logLevel);
  logManager.setColors(config.logColors);

  const pool = new ConnectionPool({
    connectTimeout: config.defaultTimeout * 1000,
    requestTimeout: config.requestTimeout * 1000,
  });
  const gateway = new ModbusGateway(pool, { defaultTimeout: config.defaultTimeout });
  const server = createMcpServer(gateway, { name: SERVER_NAME, version: SERVER_VERSION });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, closing ${pool.size} pooled connection(s)`);
    try {
      await pool.closeAll();
      await server.close();
    } catch (err: unknown) {
      logger.error('Shutdown did not complete cleanly', err);
      process.exitCode = 1;
    }
    process.exit();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  await server.connect(new StdioServerTransport());
  logger.info(`${SERVER_NAME} ${SERVER_VERSION} listening on stdio`, {
    defaultTimeout: config.defaultTimeout,
    requestTimeout: config.requestTimeout,
  });
}

main().catch((err: unknown) => {
  logger.error('Failed to start', err);
  process.exit(1);
});
