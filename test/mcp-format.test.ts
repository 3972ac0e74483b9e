import { describe, expect, it } from 'vitest';
import {
  CHARACTER_LIMIT,
  formatDiagnostics,
  formatError,
  formatRead,
  formatResult,
  formatWriteMultiple,
  truncate,
} from '../src/mcp/format.js';
import { ConnectionState } from '../src/types/modbus-types.js';
import { ReadRegistersData } from '../src/types/gateway-types.js';

const target = { host: '10.0.0.5', port: 502, unitId: 1 };

const read: ReadRegistersData = {
  ...target,
  registerType: 'holding',
  dataType: 'float32',
  functionCode: 3,
  startAddress: 10,
  count: 2,
  quantity: 4,
  values: [1.5, 0],
  raw: [0x3fc0, 0, 0, 0],
};

describe('response formatting', () => {
  it('renders reads as a table, one row per value', () => {
    expect(formatRead(read).split('\n').slice(-4)).toEqual([
      '| Address | Value | Raw |',
      '|---|---|---|',
      '| 10 | 1.5 | 0x3fc0 0x0000 |',
      '| 12 | 0 | 0x0000 0x0000 |',
    ]);
  });

  it('shows coil states as ON and OFF', () => {
    const text = formatWriteMultiple({
      ...target,
      registerType: 'coil',
      dataType: 'bool',
      functionCode: 15,
      startAddress: 0,
      count: 2,
      quantity: 2,
      values: [true, false],
    });
    expect(text).toContain('**Values written**: 2 (2 coils)');
    expect(text).toContain('**Values**: ON, OFF');
  });

  it('renders errors with kind and parameter', () => {
    expect(formatError({ kind: 'read_only', message: 'nope', parameter: 'register_type' })).toBe(
      'Error (read_only): nope\nParameter: register_type'
    );
    expect(
      formatError({
        kind: 'device_exception',
        message: 'Modbus exception',
        exceptionCode: 2,
        exceptionName: 'Illegal Data Address',
      })
    ).toBe('Error (device_exception): Modbus exception\nException code: 2 (Illegal Data Address)');
  });

  it('renders diagnostics without statistics when there is no connection', () => {
    const text = formatDiagnostics({
      ...target,
      passed: false,
      elapsedMs: 4,
      state: ConnectionState.Disconnected,
      checks: [
        { name: 'connection', status: 'fail', latencyMs: 3, detail: 'refused' },
        { name: 'latency', status: 'skipped', latencyMs: null, detail: 'No connection' },
      ],
      stats: null,
    });
    expect(text.split('\n').slice(-2)).toEqual([
      '| connection | FAIL | 3 ms | refused |',
      '| latency | SKIPPED | n/a | No connection |',
    ]);
    expect(text).toContain('**Overall**: ISSUES FOUND');
  });

  it('pretty-prints JSON with two spaces', () => {
    const result = formatResult({ success: true, data: { a: 1 } }, 'json', () => 'unused');
    expect(result.content).toEqual([{ type: 'text', text: '{\n  "a": 1\n}' }]);
    expect(result.isError).toBeUndefined();
  });

  it('marks failures as errors', () => {
    const result = formatResult(
      { success: false, error: { kind: 'timeout', message: 'late' } },
      'markdown',
      () => 'unused'
    );
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: 'text', text: 'Error (timeout): late' }]);
  });

  it('truncates long responses with a notice', () => {
    const text = truncate('x'.repeat(CHARACTER_LIMIT + 10));
    expect(text.startsWith('x'.repeat(CHARACTER_LIMIT) + '\n\n[Response truncated: 25010 characters')).toBe(true);
    expect(truncate('short')).toBe('short');
  });
});
