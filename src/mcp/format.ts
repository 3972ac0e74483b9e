// src/mcp/format.ts

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describeFunctionCode } from '../constants/constants.js';
import { ErrorDetail } from '../errors.js';
import { RegisterValue } from '../types/modbus-types.js';
import {
  ConnectData,
  DeviceInfoData,
  DeviceTarget,
  DiagnosticsData,
  DisconnectData,
  OperationResult,
  ReadRegistersData,
  WriteMultipleRegistersData,
  WriteRegisterData,
} from '../types/gateway-types.js';
import { ResponseFormat } from './schemas.js';

/** Longest tool response handed back to the caller */
export const CHARACTER_LIMIT = 25000;

export function truncate(text: string, limit: number = CHARACTER_LIMIT): string {
  if (text.length <= limit) return text;
  return (
    `${text.slice(0, limit)}\n\n` +
    `[Response truncated: ${text.length} characters exceed the ${limit} character limit. ` +
    'Request fewer values to see the full result.]'
  );
}

function hex(value: number, digits: number): string {
  return `0x${value.toString(16).padStart(digits, '0')}`;
}

function device(target: DeviceTarget): string {
  return `**Device**: ${target.host}:${target.port} (unit ${target.unitId})`;
}

function formatValue(value: RegisterValue): string {
  return typeof value === 'boolean' ? (value ? 'ON' : 'OFF') : String(value);
}

function formatMs(value: number | null): string {
  return value === null ? 'n/a' : `${value} ms`;
}

export function formatError(error: ErrorDetail): string {
  const lines = [`Error (${error.kind}): ${error.message}`];
  if (error.parameter) lines.push(`Parameter: ${error.parameter}`);
  if (error.exceptionCode !== undefined) {
    lines.push(`Exception code: ${error.exceptionCode} (${error.exceptionName ?? 'Unknown'})`);
  }
  return lines.join('\n');
}

export function formatConnect(data: ConnectData): string {
  const lines = [
    '# Modbus TCP Connection',
    '',
    `**Status**: ${data.reused ? 'Connected (reused existing connection)' : 'Connected'}`,
    device(data),
    `**State**: ${data.state}`,
    `**Probe**: ${data.probe}`,
  ];
  if (data.probeDetail) lines.push(`**Probe detail**: ${data.probeDetail}`);
  return lines.join('\n');
}

export function formatRead(data: ReadRegistersData): string {
  const width = data.values.length === 0 ? 1 : data.raw.length / data.values.length;
  const bits = data.registerType === 'coil' || data.registerType === 'discrete';
  const lines = [
    '# Modbus Read Results',
    '',
    device(data),
    `**Register type**: ${data.registerType}`,
    `**Data type**: ${data.dataType}`,
    `**Start address**: ${data.startAddress}`,
    `**Count**: ${data.count}`,
    '',
    '| Address | Value | Raw |',
    '|---|---|---|',
  ];
  data.values.forEach((value, i) => {
    const words = data.raw.slice(i * width, (i + 1) * width);
    const raw = bits ? words.join(' ') : words.map(word => hex(word, 4)).join(' ');
    lines.push(`| ${data.startAddress + i * width} | ${formatValue(value)} | ${raw} |`);
  });
  return lines.join('\n');
}

export function formatWrite(data: WriteRegisterData): string {
  return [
    '# Modbus Write Successful',
    '',
    device(data),
    `**Register type**: ${data.registerType}`,
    `**Address**: ${data.address}`,
    `**Value**: ${formatValue(data.value)} (${data.dataType})`,
    `**Function**: ${hex(data.functionCode, 2)} ${describeFunctionCode(data.functionCode)}`,
  ].join('\n');
}

export function formatWriteMultiple(data: WriteMultipleRegistersData): string {
  const unit = data.registerType === 'coil' ? 'coils' : 'registers';
  return [
    '# Modbus Multiple Write Successful',
    '',
    device(data),
    `**Register type**: ${data.registerType}`,
    `**Start address**: ${data.startAddress}`,
    `**Values written**: ${data.count} (${data.quantity} ${unit})`,
    `**Data type**: ${data.dataType}`,
    `**Values**: ${data.values.map(formatValue).join(', ')}`,
  ].join('\n');
}

export function formatDeviceInfo(data: DeviceInfoData): string {
  const lines = [
    '# Modbus Device Information',
    '',
    device(data),
    `**Category**: ${data.level}`,
    `**Conformity level**: ${hex(data.conformityLevel, 2)}`,
    '',
  ];
  const entries = Object.entries(data.objects);
  if (entries.length === 0) {
    lines.push('No identification objects returned.');
  }
  for (const [name, value] of entries) {
    lines.push(`- **${name}**: ${value}`);
  }
  return lines.join('\n');
}

export function formatDiagnostics(data: DiagnosticsData): string {
  const lines = [
    '# Modbus Diagnostics Results',
    '',
    device(data),
    `**Overall**: ${data.passed ? 'PASSED' : 'ISSUES FOUND'}`,
    `**Elapsed**: ${data.elapsedMs} ms`,
    `**Connection state**: ${data.state}`,
    '',
    '## Checks',
    '',
    '| Check | Status | Latency | Detail |',
    '|---|---|---|---|',
    ...data.checks.map(
      check =>
        `| ${check.name} | ${check.status.toUpperCase()} | ${formatMs(check.latencyMs)} | ${check.detail} |`
    ),
  ];

  const stats = data.stats;
  if (stats) {
    lines.push(
      '',
      '## Statistics',
      '',
      `- Requests: ${stats.totalRequests}`,
      `- Successful: ${stats.successfulResponses}`,
      `- Errors: ${stats.errorResponses} (timeouts ${stats.timeouts}, device exceptions ${stats.modbusExceptions})`,
      `- Error rate: ${stats.errorRate === null ? 'n/a' : `${stats.errorRate}%`}`,
      `- Response time: min ${formatMs(stats.minResponseTime)}, avg ${formatMs(stats.averageResponseTime)}, max ${formatMs(stats.maxResponseTime)}`,
      `- Bytes sent/received: ${stats.totalDataSent}/${stats.totalDataReceived}`
    );
  }
  return lines.join('\n');
}

export function formatDisconnect(data: DisconnectData): string {
  return [
    '# Modbus Disconnect',
    '',
    data.disconnected
      ? `Disconnected from ${data.key}`
      : `No open connection to ${data.key}`,
  ].join('\n');
}

/**
 * Renders an operation outcome as a tool result. Failures are marked
 * `isError` and carry the error detail instead of data.
 */
export function formatResult<T>(
  result: OperationResult<T>,
  format: ResponseFormat,
  markdown: (data: T) => string
): CallToolResult {
  if (!result.success) {
    const text =
      format === 'json' ? JSON.stringify(result.error, null, 2) : formatError(result.error);
    return { content: [{ type: 'text', text: truncate(text) }], isError: true };
  }
  const text = format === 'json' ? JSON.stringify(result.data, null, 2) : markdown(result.data);
  return { content: [{ type: 'text', text: truncate(text) }] };
}
