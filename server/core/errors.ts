/**
 * Qubit Drift Simulator — 统一错误体系
 * 分层错误类 + 错误码
 *
 * 使用方式：
 *   import { InvalidConfigurationError, ValidationError } from '../core/errors';
 *   throw new InvalidConfigurationError('activationDay must not exceed durationDays', { activationDay: 130 });
 *   throw new ValidationError('Series length mismatch', { expected: 2880, actual: 24 });
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // 验证错误 (2xxx)
  VALIDATION = 2000,
  INVALID_INPUT = 2001,
  OUT_OF_RANGE = 2004,
  INVALID_CONFIGURATION = 2005,
}

// ============================================
// 基础错误类
// ============================================

export class SimulationError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为结构化输出格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 验证错误（算法输入不合法） */
export class ValidationError extends SimulationError {
  constructor(message: string, context: Record<string, unknown> = {}, code: ErrorCode = ErrorCode.VALIDATION) {
    super(message, code, context);
  }
}

/**
 * 配置错误 — 引擎唯一的业务错误
 * 构造时同步抛出，任何仿真计算开始之前
 */
export class InvalidConfigurationError extends SimulationError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(`Invalid configuration: ${message}`, ErrorCode.INVALID_CONFIGURATION, context);
  }
}

// ============================================
// 错误处理工具
// ============================================

/** 判断是否为 SimulationError */
export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}

/** 将未知错误包装为 SimulationError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): SimulationError {
  if (isSimulationError(err)) return err;

  if (err instanceof Error) {
    return new SimulationError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    }, false);
  }

  return new SimulationError(String(err), ErrorCode.UNKNOWN, context, false);
}
