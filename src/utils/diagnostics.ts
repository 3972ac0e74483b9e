// src/utils/diagnostics.ts

import { describeFunctionCode } from '../constants/constants.js';
import { ModbusExceptionError, ModbusFrameError, ModbusTimeoutError } from '../errors.js';
import { logManager } from '../logger.js';
import { DiagnosticsOptions, DiagnosticsStats, LoggerInstance } from '../types/modbus-types.js';

const DEFAULT_MAX_RECENT_ERRORS = 10;

/**
 * Collects traffic statistics of one Modbus connection.
 */
class Diagnostics {
  private logger: LoggerInstance;
  private maxRecentErrors: number;
  private startTime: number;
  private totalRequests: number = 0;
  private successfulResponses: number = 0;
  private errorResponses: number = 0;
  private timeouts: number = 0;
  private frameErrors: number = 0;
  private modbusExceptions: number = 0;
  private exceptionCodeCounts: Record<number, number> = {};
  private functionCallCounts: Record<string, number> = {};
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private lastErrorMessage: string | null = null;
  private lastErrors: string[] = [];
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;
  private lastRequestTimestamp: string | null = null;
  private lastSuccessTimestamp: string | null = null;
  private lastErrorTimestamp: string | null = null;

  constructor(options: DiagnosticsOptions = {}) {
    this.logger = logManager.createLogger(options.loggerName ?? 'Diagnostics');
    this.maxRecentErrors = options.maxRecentErrors ?? DEFAULT_MAX_RECENT_ERRORS;
    this.startTime = Date.now();
  }

  /**
   * Records a request and the function it calls.
   */
  recordRequest(unitId: number, funcCode: number): void {
    this.totalRequests++;
    this.lastRequestTimestamp = new Date().toISOString();
    const name = describeFunctionCode(funcCode);
    this.functionCallCounts[name] = (this.functionCallCounts[name] ?? 0) + 1;
    this.logger.trace('Request sent', { unitId, funcCode });
  }

  recordSuccess(responseTimeMs: number, unitId: number, funcCode: number): void {
    this.successfulResponses++;
    this.lastResponseTime = responseTimeMs;
    this.minResponseTime =
      this.minResponseTime == null
        ? responseTimeMs
        : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null
        ? responseTimeMs
        : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
    this.lastSuccessTimestamp = new Date().toISOString();
    this.logger.trace('Response received', { unitId, funcCode, responseTime: responseTimeMs });
  }

  /**
   * Records a failed transaction. Device exceptions count as round trips in
   * the response-time figures since the device did answer.
   */
  recordError(error: Error, responseTimeMs: number, unitId: number, funcCode: number): void {
    this.errorResponses++;
    this.lastErrorMessage = error.message;
    this.lastErrorTimestamp = new Date().toISOString();

    this.lastErrors.push(error.message);
    if (this.lastErrors.length > this.maxRecentErrors) this.lastErrors.shift();

    let exceptionCode: number | undefined;
    if (error instanceof ModbusTimeoutError) {
      this.timeouts++;
    } else if (error instanceof ModbusFrameError) {
      this.frameErrors++;
    } else if (error instanceof ModbusExceptionError) {
      this.modbusExceptions++;
      exceptionCode = error.exceptionCode;
      this.exceptionCodeCounts[exceptionCode] = (this.exceptionCodeCounts[exceptionCode] ?? 0) + 1;
    }

    this.logger.debug(error.message, {
      unitId,
      funcCode,
      exceptionCode,
      responseTime: responseTimeMs,
    });
  }

  recordDataSent(byteLength: number): void {
    this.totalDataSent += byteLength;
  }

  recordDataReceived(byteLength: number): void {
    this.totalDataReceived += byteLength;
  }

  /**
   * Average response time of successful transactions, in milliseconds.
   */
  get averageResponseTime(): number | null {
    return this.successfulResponses === 0
      ? null
      : this._totalResponseTime / this.successfulResponses;
  }

  /**
   * Failed transactions as a percentage of requests.
   */
  get errorRate(): number | null {
    return this.totalRequests === 0 ? null : (this.errorResponses / this.totalRequests) * 100;
  }

  getStats(): DiagnosticsStats {
    const average = this.averageResponseTime;
    const errorRate = this.errorRate;
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      totalRequests: this.totalRequests,
      successfulResponses: this.successfulResponses,
      errorResponses: this.errorResponses,
      errorRate: errorRate === null ? null : Math.round(errorRate * 100) / 100,
      timeouts: this.timeouts,
      frameErrors: this.frameErrors,
      modbusExceptions: this.modbusExceptions,
      exceptionCodeCounts: { ...this.exceptionCodeCounts },
      functionCallCounts: { ...this.functionCallCounts },
      lastResponseTime: this.lastResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      averageResponseTime: average === null ? null : Math.round(average * 100) / 100,
      totalDataSent: this.totalDataSent,
      totalDataReceived: this.totalDataReceived,
      lastErrorMessage: this.lastErrorMessage,
      recentErrors: [...this.lastErrors],
      lastRequestTimestamp: this.lastRequestTimestamp,
      lastSuccessTimestamp: this.lastSuccessTimestamp,
      lastErrorTimestamp: this.lastErrorTimestamp,
    };
  }
}

export default Diagnostics;
