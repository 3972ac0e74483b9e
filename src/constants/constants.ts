// src/constants/constants.ts

/**
 * Modbus function codes handled by the client (standard set only).
 */
export enum ModbusFunctionCode {
  READ_COILS = 0x01,
  READ_DISCRETE_INPUTS = 0x02,
  READ_HOLDING_REGISTERS = 0x03,
  READ_INPUT_REGISTERS = 0x04,
  WRITE_SINGLE_COIL = 0x05,
  WRITE_SINGLE_REGISTER = 0x06,
  WRITE_MULTIPLE_COILS = 0x0f,
  WRITE_MULTIPLE_REGISTERS = 0x10,
  READ_DEVICE_IDENTIFICATION = 0x2b,
}

export const FUNCTION_CODE_NAMES = new Map<number, string>([
  [ModbusFunctionCode.READ_COILS, 'READ_COILS'],
  [ModbusFunctionCode.READ_DISCRETE_INPUTS, 'READ_DISCRETE_INPUTS'],
  [ModbusFunctionCode.READ_HOLDING_REGISTERS, 'READ_HOLDING_REGISTERS'],
  [ModbusFunctionCode.READ_INPUT_REGISTERS, 'READ_INPUT_REGISTERS'],
  [ModbusFunctionCode.WRITE_SINGLE_COIL, 'WRITE_SINGLE_COIL'],
  [ModbusFunctionCode.WRITE_SINGLE_REGISTER, 'WRITE_SINGLE_REGISTER'],
  [ModbusFunctionCode.WRITE_MULTIPLE_COILS, 'WRITE_MULTIPLE_COILS'],
  [ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS, 'WRITE_MULTIPLE_REGISTERS'],
  [ModbusFunctionCode.READ_DEVICE_IDENTIFICATION, 'READ_DEVICE_IDENTIFICATION'],
]);

/**
 * Modbus exception codes
 */
export enum ModbusExceptionCode {
  ILLEGAL_FUNCTION = 1,
  ILLEGAL_DATA_ADDRESS = 2,
  ILLEGAL_DATA_VALUE = 3,
  SLAVE_DEVICE_FAILURE = 4,
  ACKNOWLEDGE = 5,
  SLAVE_DEVICE_BUSY = 6,
  NEGATIVE_ACKNOWLEDGE = 7,
  MEMORY_PARITY_ERROR = 8,
  GATEWAY_PATH_UNAVAILABLE = 10,
  GATEWAY_TARGET_DEVICE_FAILED = 11,
}

export const MODBUS_EXCEPTION_MESSAGES = new Map<number, string>([
  [ModbusExceptionCode.ILLEGAL_FUNCTION, 'Illegal Function'],
  [ModbusExceptionCode.ILLEGAL_DATA_ADDRESS, 'Illegal Data Address'],
  [ModbusExceptionCode.ILLEGAL_DATA_VALUE, 'Illegal Data Value'],
  [ModbusExceptionCode.SLAVE_DEVICE_FAILURE, 'Slave Device Failure'],
  [ModbusExceptionCode.ACKNOWLEDGE, 'Acknowledge'],
  [ModbusExceptionCode.SLAVE_DEVICE_BUSY, 'Slave Device Busy'],
  [ModbusExceptionCode.NEGATIVE_ACKNOWLEDGE, 'Negative Acknowledge'],
  [ModbusExceptionCode.MEMORY_PARITY_ERROR, 'Memory Parity Error'],
  [ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE, 'Gateway Path Unavailable'],
  [ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED, 'Gateway Target Device Failed to Respond'],
]);

/**
 * Human-readable meaning of an exception code; unknown codes map to `Device Exception(<code>)`.
 */
export function describeExceptionCode(code: number): string {
  return MODBUS_EXCEPTION_MESSAGES.get(code) ?? `Device Exception(${code})`;
}

export function describeFunctionCode(code: number): string {
  const name = FUNCTION_CODE_NAMES.get(code & 0x7f) ?? 'Unknown';
  return code & 0x80 ? `${name}_EXCEPTION` : name;
}

/**
 * Register classes (Modbus data tables)
 */
export enum RegisterClass {
  HOLDING = 'holding',
  INPUT = 'input',
  COIL = 'coil',
  DISCRETE = 'discrete',
}

/**
 * Typed interpretations of register words
 */
export enum DataType {
  UINT16 = 'uint16',
  INT16 = 'int16',
  UINT32 = 'uint32',
  INT32 = 'int32',
  FLOAT32 = 'float32',
  BOOL = 'bool',
}

export const REGISTER_CLASSES: readonly RegisterClass[] = Object.values(RegisterClass);
export const DATA_TYPES: readonly DataType[] = Object.values(DataType);

export function isRegisterClass(value: unknown): value is RegisterClass {
  return REGISTER_CLASSES.some(registerClass => registerClass === value);
}

export function isDataType(value: unknown): value is DataType {
  return DATA_TYPES.some(dataType => dataType === value);
}

/** Bit-addressed classes (one bit per element) */
export function isBitClass(registerClass: RegisterClass): boolean {
  return registerClass === RegisterClass.COIL || registerClass === RegisterClass.DISCRETE;
}

/** Classes a client may write to */
export function isWritableClass(registerClass: RegisterClass): boolean {
  return registerClass === RegisterClass.HOLDING || registerClass === RegisterClass.COIL;
}

export const READ_FUNCTION_CODES: Record<RegisterClass, ModbusFunctionCode> = {
  [RegisterClass.COIL]: ModbusFunctionCode.READ_COILS,
  [RegisterClass.DISCRETE]: ModbusFunctionCode.READ_DISCRETE_INPUTS,
  [RegisterClass.HOLDING]: ModbusFunctionCode.READ_HOLDING_REGISTERS,
  [RegisterClass.INPUT]: ModbusFunctionCode.READ_INPUT_REGISTERS,
};

// --- Protocol limits ---

export const MBAP_HEADER_LENGTH = 7;
export const MODBUS_PROTOCOL_ID = 0;
/** Max PDU size is 253 bytes, so MBAP length (unit id + PDU) never exceeds 254 */
export const MAX_MBAP_LENGTH = 254;
export const MAX_TRANSACTION_ID = 0xffff;

export const MIN_ADDRESS = 0;
export const MAX_ADDRESS = 0xffff;
export const MIN_UNIT_ID = 0;
export const MAX_UNIT_ID = 255;

export const MAX_READ_REGISTERS = 125;
export const MAX_READ_BITS = 2000;
export const MAX_WRITE_REGISTERS = 123;
export const MAX_WRITE_COILS = 1968;

export const COIL_ON = 0xff00;
export const COIL_OFF = 0x0000;

// --- Defaults ---

export const DEFAULT_PORT = 502;
export const DEFAULT_UNIT_ID = 1;
/** Seconds, as accepted by the caller-facing operations */
export const DEFAULT_TIMEOUT_SECONDS = 10;
export const MAX_TIMEOUT_SECONDS = 60;
