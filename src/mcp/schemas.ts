// src/mcp/schemas.ts

import { z } from 'zod';
import { DataType, MAX_READ_BITS, MAX_WRITE_COILS, RegisterClass } from '../constants/constants.js';

export const ResponseFormat = z
  .enum(['markdown', 'json'])
  .default('markdown')
  .describe("Output format: 'markdown' for human-readable text, 'json' for structured data");

export type ResponseFormat = z.infer<typeof ResponseFormat>;

const host = z
  .string()
  .trim()
  .min(1, 'Host is required')
  .max(255)
  .describe("Modbus device IP address or hostname (e.g. '192.168.1.100')");

const port = z.number().int().min(1).max(65535).default(502).describe('Modbus TCP port');

const unitId = z
  .number()
  .int()
  .min(0)
  .max(255)
  .default(1)
  .describe('Modbus unit (slave) ID of the target device');

const address = z.number().int().min(0).max(65535);

const registerType = z
  .nativeEnum(RegisterClass)
  .describe('Register table: holding, input, coil or discrete');

const writeRegisterType = registerType
  .default(RegisterClass.HOLDING)
  .describe('Register table to write: holding or coil (input and discrete are read-only)');

const dataType = z
  .nativeEnum(DataType)
  .default(DataType.UINT16)
  .describe('Value interpretation; 32-bit types span two registers, high word first');

const value = z.union([z.number(), z.boolean()]);

export const ConnectInputShape = {
  host,
  port,
  unit_id: unitId,
  timeout: z
    .number()
    .gt(0)
    .max(60)
    .optional()
    .describe('Connection timeout in seconds (default from server configuration, 10)'),
  response_format: ResponseFormat,
};

export const ReadRegistersInputShape = {
  host,
  register_type: registerType,
  start_address: address.describe('First address, 0-based'),
  count: z
    .number()
    .int()
    .min(1)
    .max(MAX_READ_BITS)
    .describe('Number of values to read (at most 125 / registers per value for register tables, 2000 bits)'),
  data_type: dataType,
  port,
  unit_id: unitId,
  response_format: ResponseFormat,
};

export const WriteRegisterInputShape = {
  host,
  address: address.describe('Register or coil address, 0-based'),
  value: value.describe('Value to write; true/false or 1/0 for coils'),
  register_type: writeRegisterType,
  data_type: dataType,
  port,
  unit_id: unitId,
  response_format: ResponseFormat,
};

export const WriteMultipleRegistersInputShape = {
  host,
  start_address: address.describe('First address, 0-based'),
  values: z
    .array(value)
    .min(1)
    .max(MAX_WRITE_COILS)
    .describe('Values to write (holding: at most 123 registers in total, coil: at most 1968)'),
  register_type: writeRegisterType,
  data_type: dataType,
  port,
  unit_id: unitId,
  response_format: ResponseFormat,
};

export const DeviceInfoInputShape = {
  host,
  port,
  unit_id: unitId,
  level: z
    .enum(['basic', 'regular', 'extended'])
    .default('basic')
    .describe('Identification object category to read'),
  response_format: ResponseFormat,
};

export const DiagnosticsInputShape = {
  host,
  port,
  unit_id: unitId,
  test_read: z.boolean().default(true).describe('Perform a test read'),
  test_address: address.default(0).describe('Address of the test read'),
  test_register_type: registerType.default(RegisterClass.HOLDING).describe('Register table of the test read'),
  response_format: ResponseFormat,
};

export const DisconnectInputShape = {
  host,
  port,
  response_format: ResponseFormat,
};
