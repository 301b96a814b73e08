/**
 * Qubit Drift Simulator — 统一配置中心
 * 应用与仿真默认参数的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const horizon = config.simulation.durationDays;
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件 > 默认值
 *
 * 零依赖原则：本文件仅依赖 process.env，不导入任何其他模块
 */

// ============================================
// 辅助函数
// ============================================

function env(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** 非法数值保留为 NaN，交给 config-schema 报告 */
function envInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  return v ? Number(v) : defaultValue;
}

// ============================================
// 配置结构
// ============================================

export const config = {

  // ──────────────────────────────────────────
  // 应用基础
  // ──────────────────────────────────────────

  /** 应用基础配置 */
  app: {
    name: env('APP_NAME', 'Qubit Drift Simulator'),
    version: env('APP_VERSION', '1.0.0'),
    env: env('NODE_ENV', 'development'),
    /** 日志级别；生产环境输出 JSON 行，其余环境输出彩色文本 */
    logLevel: env('LOG_LEVEL', 'info'),
  },

  // ──────────────────────────────────────────
  // 仿真
  // ──────────────────────────────────────────

  /** 命令行入口的默认仿真参数 */
  simulation: {
    /** 仿真时长（天） */
    durationDays: envInt('SIM_DURATION_DAYS', 120),
    /** 纠错激活日 */
    activationDay: envInt('SIM_ACTIVATION_DAY', 75),
    /** 随机种子（固定默认值保证可复现） */
    seed: envInt('SIM_SEED', 42),
  },
};
