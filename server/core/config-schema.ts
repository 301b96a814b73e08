/**
 * ============================================================================
 * 配置验证 Schema — Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证环境变量的类型和范围
 *   2. 提供清晰的错误消息，帮助快速定位配置问题
 *
 * 仿真参数之间的约束（activationDay ≤ durationDays）由仿真配置在构造时校验，
 * 此处只做单字段类型检查。
 *
 * 使用方式：
 *   import { validateConfigWithSchema } from './config-schema';
 *   const result = validateConfigWithSchema(config);
 *
 * ============================================================================
 */

import { z } from 'zod';
import { createModuleLogger, LOG_LEVEL_NAMES } from './logger';
import { MAX_SEED } from '../lib/math/prng';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

/** 应用基础配置 */
const appSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+/, 'must be semver format (e.g., 1.0.0)'),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(LOG_LEVEL_NAMES),
});

/** 仿真默认参数 */
const simulationSchema = z.object({
  durationDays: z.number().int(),
  activationDay: z.number().int(),
  seed: z.number().int().min(0).max(MAX_SEED),
});

/** 完整配置 Schema */
const configSchema = z.object({
  app: appSchema,
  simulation: simulationSchema,
});

export type ValidatedConfig = z.infer<typeof configSchema>;

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  data?: ValidatedConfig;
}

/**
 * 使用 Zod Schema 验证配置
 *
 * @param cfg - config 对象（来自 config.ts）
 */
export function validateConfigWithSchema(cfg: unknown): ConfigValidationResult {
  const result = configSchema.safeParse(cfg);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    log.warn({ errors }, `Configuration validation found ${errors.length} error(s)`);
    return { success: false, errors };
  }

  log.debug('Configuration validation passed');
  return { success: true, errors: [], data: result.data };
}
