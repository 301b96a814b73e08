/**
 * 仿真配置构造与校验
 *
 * 校验失败在任何计算之前同步抛出 InvalidConfigurationError。
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../core/errors';
import { MAX_SEED } from '../lib/math/prng';
import type { SimulationConfig, SimulationConfigInput } from './simulation.types';

export const HOURS_PER_DAY = 24;
export const DEFAULT_SEED = 42;

const simulationConfigSchema = z
  .object({
    durationDays: z.number().int().positive(),
    activationDay: z.number().int().nonnegative(),
    seed: z.number().int().min(0).max(MAX_SEED).default(DEFAULT_SEED),
  })
  .refine(cfg => cfg.activationDay <= cfg.durationDays, {
    message: 'activationDay must not exceed durationDays',
    path: ['activationDay'],
  });

export function createSimulationConfig(input: SimulationConfigInput): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigurationError(issues.join('; '), {
      durationDays: input.durationDays,
      activationDay: input.activationDay,
      seed: input.seed,
      issues,
    });
  }

  const { durationDays, activationDay, seed } = parsed.data;
  return Object.freeze({
    durationDays,
    activationDay,
    seed,
    ticks: durationDays * HOURS_PER_DAY,
  });
}
