// src/utils/register-codec.ts

import { DataType, isDataType } from '../constants/constants.js';
import { ModbusEncodingError } from '../errors.js';
import { RegisterValue } from '../types/modbus-types.js';

interface DataTypeCodec {
  width: 1 | 2;
  encode(value: RegisterValue, parameter: string): number[];
  decode(registers: readonly number[]): RegisterValue;
}

const FLOAT32_MAX = 3.4028234663852886e38;

function describe(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}

function requireInteger(
  value: RegisterValue,
  dataType: DataType,
  min: number,
  max: number,
  parameter: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ModbusEncodingError(
      `Value ${describe(value)} is not an integer; ${dataType} requires an integer between ${min} and ${max}`,
      parameter
    );
  }
  if (value < min || value > max) {
    throw new ModbusEncodingError(
      `Value ${value} out of range for ${dataType} (${min}..${max})`,
      parameter
    );
  }
  return value;
}

function splitWords(value: number): number[] {
  return [(value >>> 16) & 0xffff, value & 0xffff];
}

function joinWords(registers: readonly number[]): number {
  return ((registers[0] << 16) | registers[1]) >>> 0;
}

const CODECS: Record<DataType, DataTypeCodec> = {
  [DataType.UINT16]: {
    width: 1,
    encode: (value, parameter) => [requireInteger(value, DataType.UINT16, 0, 0xffff, parameter)],
    decode: registers => registers[0],
  },
  [DataType.INT16]: {
    width: 1,
    encode: (value, parameter) => [
      requireInteger(value, DataType.INT16, -0x8000, 0x7fff, parameter) & 0xffff,
    ],
    decode: registers => (registers[0] << 16) >> 16,
  },
  [DataType.UINT32]: {
    width: 2,
    encode: (value, parameter) =>
      splitWords(requireInteger(value, DataType.UINT32, 0, 0xffffffff, parameter)),
    decode: joinWords,
  },
  [DataType.INT32]: {
    width: 2,
    encode: (value, parameter) =>
      splitWords(requireInteger(value, DataType.INT32, -0x80000000, 0x7fffffff, parameter) >>> 0),
    decode: registers => joinWords(registers) | 0,
  },
  [DataType.FLOAT32]: {
    width: 2,
    encode: (value, parameter) => {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ModbusEncodingError(
          `Value ${describe(value)} is not a finite number; float32 requires one`,
          parameter
        );
      }
      if (Math.abs(value) > FLOAT32_MAX) {
        throw new ModbusEncodingError(`Value ${value} out of range for float32`, parameter);
      }
      const view = new DataView(new ArrayBuffer(4));
      view.setFloat32(0, value, false);
      return [view.getUint16(0, false), view.getUint16(2, false)];
    },
    decode: registers => {
      const view = new DataView(new ArrayBuffer(4));
      view.setUint16(0, registers[0], false);
      view.setUint16(2, registers[1], false);
      return view.getFloat32(0, false);
    },
  },
  [DataType.BOOL]: {
    width: 1,
    encode: (value, parameter) => [encodeBoolean(value, parameter) ? 1 : 0],
    decode: registers => registers[0] !== 0,
  },
};

function encodeBoolean(value: RegisterValue, parameter: string): boolean {
  if (value === true || value === 1) return true;
  if (value === false || value === 0) return false;
  throw new ModbusEncodingError(
    `Value ${describe(value)} is not a boolean; expected true/false or 1/0`,
    parameter
  );
}

/**
 * Narrows a caller-supplied tag to a DataType.
 * @throws ModbusEncodingError on an unknown tag
 */
export function toDataType(value: unknown, parameter: string = 'dataType'): DataType {
  if (!isDataType(value)) {
    throw new ModbusEncodingError(
      `Unrecognized data type ${describe(value)}; expected one of ${Object.values(DataType).join(', ')}`,
      parameter
    );
  }
  return value;
}

/** Registers occupied by one value of the given type */
export function registerWidth(dataType: DataType): 1 | 2 {
  return CODECS[dataType].width;
}

/**
 * Encodes one value into its register words, high word first.
 */
export function encodeValue(
  value: RegisterValue,
  dataType: DataType,
  parameter: string = 'value'
): number[] {
  return CODECS[dataType].encode(value, parameter);
}

export function encodeValues(
  values: readonly RegisterValue[],
  dataType: DataType,
  parameter: string = 'values'
): number[] {
  return values.flatMap((value, i) => encodeValue(value, dataType, `${parameter}[${i}]`));
}

/**
 * Decodes exactly one value. The register count must equal the type's width
 * and every register must be a 16-bit unsigned word.
 */
export function decodeValue(registers: readonly number[], dataType: DataType): RegisterValue {
  const codec = CODECS[dataType];
  if (registers.length !== codec.width) {
    throw new ModbusEncodingError(
      `${dataType} needs ${codec.width} register(s), got ${registers.length}`
    );
  }
  for (const register of registers) {
    if (!Number.isInteger(register) || register < 0 || register > 0xffff) {
      throw new ModbusEncodingError(`Register word ${register} is not a 16-bit unsigned value`);
    }
  }
  return codec.decode(registers);
}

/**
 * Decodes a run of registers, `registerWidth(dataType)` words per value.
 */
export function decodeRegisters(registers: readonly number[], dataType: DataType): RegisterValue[] {
  const width = registerWidth(dataType);
  if (registers.length % width !== 0) {
    throw new ModbusEncodingError(
      `${registers.length} register(s) do not divide into ${dataType} values of ${width} registers`
    );
  }
  const values: RegisterValue[] = [];
  for (let i = 0; i < registers.length; i += width) {
    values.push(decodeValue(registers.slice(i, i + width), dataType));
  }
  return values;
}

/**
 * Coil state from true/false or 1/0.
 */
export function encodeCoil(value: RegisterValue, parameter: string = 'value'): boolean {
  return encodeBoolean(value, parameter);
}
