/**
 * Qubit Drift Simulator — 结构化日志
 *
 * 所有日志写入 stderr，stdout 只留给仿真报告（`--json` 输出可直接管道给 JSON 消费方）。
 * 级别与输出格式不读环境变量，由命令行入口按 config.app 调用 configureLogger 设置。
 *
 * 使用方式：
 *   import { createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('simulation-engine');
 *   log.debug({ ticks, seed }, 'Simulation finished');
 */

export const LOG_LEVEL_NAMES = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = typeof LOG_LEVEL_NAMES[number];

type LogData = Record<string, unknown> | string;

export interface LoggerSettings {
  level: LogLevel;
  /** true: 彩色单行；false: JSON 行 */
  pretty: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const RESET = '\x1b[0m';

const settings: LoggerSettings = { level: 'info', pretty: true };

/** 更新全局级别 / 输出格式，未给出的字段保持不变 */
export function configureLogger(next: Partial<LoggerSettings>): void {
  if (next.level !== undefined) settings.level = next.level;
  if (next.pretty !== undefined) settings.pretty = next.pretty;
}

// ============================================
// Logger
// ============================================

function splitArgs(data: LogData, message: unknown): { msg: string; extra: Record<string, unknown> } {
  if (typeof data !== 'string') {
    return { msg: message === undefined ? '' : String(message), extra: data };
  }
  if (message === undefined || typeof message === 'string') {
    return { msg: data, extra: {} };
  }
  // 第二参数为 Error 等非字符串值时挂到 err 字段
  const err = message instanceof Error ? { message: message.message, stack: message.stack } : message;
  return { msg: data, extra: { err } };
}

export class Logger {
  constructor(private readonly module: string) {}

  /** 子日志器，模块名为 `parent:sub` */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`);
  }

  trace(data: LogData, message?: unknown): void { this.emit('trace', data, message); }
  debug(data: LogData, message?: unknown): void { this.emit('debug', data, message); }
  info(data: LogData, message?: unknown): void { this.emit('info', data, message); }
  warn(data: LogData, message?: unknown): void { this.emit('warn', data, message); }
  error(data: LogData, message?: unknown): void { this.emit('error', data, message); }
  fatal(data: LogData, message?: unknown): void { this.emit('fatal', data, message); }

  private emit(level: LogLevel, data: LogData, message: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[settings.level]) return;

    const timestamp = new Date().toISOString();
    const { msg, extra } = splitArgs(data, message);

    if (!settings.pretty) {
      process.stderr.write(JSON.stringify({ level, module: this.module, timestamp, message: msg, ...extra }) + '\n');
      return;
    }

    const time = timestamp.slice(11, 23); // HH:mm:ss.SSS
    const extraStr = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : '';
    process.stderr.write(
      `${LEVEL_COLORS[level]}${time} ${level.toUpperCase().padEnd(5)}${RESET} [${this.module}] ${msg}${extraStr}\n`,
    );
  }
}

/** 根日志器 */
export const logger = new Logger('qsim');

export function createModuleLogger(module: string): Logger {
  return new Logger(module);
}
