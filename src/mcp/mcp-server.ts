// src/mcp/mcp-server.ts

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ModbusGateway } from '../gateway.js';
import {
  formatConnect,
  formatDeviceInfo,
  formatDiagnostics,
  formatDisconnect,
  formatRead,
  formatResult,
  formatWrite,
  formatWriteMultiple,
} from './format.js';
import {
  ConnectInputShape,
  DeviceInfoInputShape,
  DiagnosticsInputShape,
  DisconnectInputShape,
  ReadRegistersInputShape,
  WriteMultipleRegistersInputShape,
  WriteRegisterInputShape,
} from './schemas.js';

export interface McpServerInfo {
  name: string;
  version: string;
}

/**
 * Exposes the gateway operations as MCP tools. Arguments arrive in
 * snake_case and are handed to the gateway unchanged otherwise; the gateway
 * repeats every range check.
 */
export function createMcpServer(gateway: ModbusGateway, info: McpServerInfo): McpServer {
  const server = new McpServer(info);

  server.registerTool(
    'modbus_connect',
    {
      title: 'Connect to Modbus TCP Device',
      description:
        'Open (or reuse) a TCP connection to a Modbus device and verify it responds by reading holding register 0. ' +
        'A device that answers with a Modbus exception is still reported as connected.',
      inputSchema: ConnectInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ host, port, unit_id, timeout, response_format }) =>
      formatResult(
        await gateway.connect({ host, port, unitId: unit_id, timeout }),
        response_format,
        formatConnect
      )
  );

  server.registerTool(
    'modbus_read_registers',
    {
      title: 'Read Modbus Registers',
      description:
        'Read holding registers, input registers, coils or discrete inputs. ' +
        'Register values can be decoded as uint16, int16, uint32, int32 or float32; 32-bit values use two registers, high word first.',
      inputSchema: ReadRegistersInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ host, port, unit_id, register_type, start_address, count, data_type, response_format }) =>
      formatResult(
        await gateway.readRegisters({
          host,
          port,
          unitId: unit_id,
          registerType: register_type,
          startAddress: start_address,
          count,
          dataType: data_type,
        }),
        response_format,
        formatRead
      )
  );

  server.registerTool(
    'modbus_write_register',
    {
      title: 'Write Modbus Register',
      description:
        'Write one value to a holding register or coil. 32-bit data types write two consecutive registers. ' +
        'Input registers and discrete inputs are read-only.',
      inputSchema: WriteRegisterInputShape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ host, port, unit_id, address, value, register_type, data_type, response_format }) =>
      formatResult(
        await gateway.writeRegister({
          host,
          port,
          unitId: unit_id,
          address,
          value,
          registerType: register_type,
          dataType: data_type,
        }),
        response_format,
        formatWrite
      )
  );

  server.registerTool(
    'modbus_write_multiple_registers',
    {
      title: 'Write Multiple Modbus Registers',
      description:
        'Write consecutive holding registers (FC16) or coils (FC15) in one request.',
      inputSchema: WriteMultipleRegistersInputShape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ host, port, unit_id, start_address, values, register_type, data_type, response_format }) =>
      formatResult(
        await gateway.writeMultipleRegisters({
          host,
          port,
          unitId: unit_id,
          startAddress: start_address,
          values,
          registerType: register_type,
          dataType: data_type,
        }),
        response_format,
        formatWriteMultiple
      )
  );

  server.registerTool(
    'modbus_device_info',
    {
      title: 'Read Modbus Device Identification',
      description:
        'Read vendor name, product code, revision and other identification objects (FC43 / MEI 0x0E).',
      inputSchema: DeviceInfoInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true,
      },
    },
    async ({ host, port, unit_id, level, response_format }) =>
      formatResult(
        await gateway.deviceInfo({ host, port, unitId: unit_id, level }),
        response_format,
        formatDeviceInfo
      )
  );

  server.registerTool(
    'modbus_diagnostics',
    {
      title: 'Run Modbus Diagnostics',
      description:
        'Check connectivity, measure round-trip latency and optionally perform a test read. ' +
        'Returns per-check results and the connection statistics.',
      inputSchema: DiagnosticsInputShape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    async ({ host, port, unit_id, test_read, test_address, test_register_type, response_format }) =>
      formatResult(
        await gateway.diagnostics({
          host,
          port,
          unitId: unit_id,
          testRead: test_read,
          testAddress: test_address,
          testRegisterType: test_register_type,
        }),
        response_format,
        formatDiagnostics
      )
  );

  server.registerTool(
    'modbus_disconnect',
    {
      title: 'Disconnect from Modbus Device',
      description: 'Close the pooled connection to a Modbus device.',
      inputSchema: DisconnectInputShape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ host, port, response_format }) =>
      formatResult(await gateway.disconnect({ host, port }), response_format, formatDisconnect)
  );

  return server;
}
