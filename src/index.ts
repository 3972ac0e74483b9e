// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export * from './types/modbus-types.js';
export * from './types/gateway-types.js';

export {
  toDataType,
  registerWidth,
  encodeValue,
  encodeValues,
  decodeValue,
  decodeRegisters,
  encodeCoil,
} from './utils/register-codec.js';

export { TcpFramer } from './framers/tcp-framer.js';
export type { ModbusFramer, FramerContext } from './framers/modbus-framer.js';
export { default as NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { ModbusConnection, defaultTransportFactory } from './connection/modbus-connection.js';
export {
  ConnectionPool,
  type ConnectionFactory,
  type ConnectionLease,
  type ConnectionPoolOptions,
} from './connection/connection-pool.js';
export { ModbusGateway, type ModbusGatewayOptions } from './gateway.js';
export { default as Diagnostics } from './utils/diagnostics.js';
export { default as Logger, logManager } from './logger.js';
export { loadConfig, type GatewayConfig } from './config.js';
export { createMcpServer, type McpServerInfo } from './mcp/mcp-server.js';
export { formatResult, truncate, CHARACTER_LIMIT } from './mcp/format.js';
