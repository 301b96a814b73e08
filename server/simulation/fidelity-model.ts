/**
 * ============================================================================
 * 保真度变换
 * ============================================================================
 *
 *   value = baseline − (temp − 15)·sensitivity + noise·coupling
 *   激活后（硬阶跃，非渐变）再加 uplift
 *   最终逐元素截断到 [0, 1]，越界值饱和而非报错
 *
 * 两种技术共享同一次运行的温度与噪声实现，便于做激活前后的配对比较。
 */

import { clip } from '../algorithms/_core/dsp';
import { ValidationError } from '../core/errors';
import type { FidelityModel } from './simulation.types';
import { REFERENCE_TEMPERATURE_C } from './thermal-model';

// ============================================================================
// 模型常量（固定，不对外开放配置）
// ============================================================================

export const SUPERCONDUCTING_MODEL: FidelityModel = {
  technology: 'SC',
  label: 'Superconducting Qubits (SC)',
  baseline: 0.70,
  temperatureSensitivity: 0.012,
  noiseCoupling: 1.0,
  activationUplift: 0.22,
};

export const TRAPPED_ION_MODEL: FidelityModel = {
  technology: 'TI',
  label: 'Trapped-Ion Qubits (TI)',
  baseline: 0.85,
  temperatureSensitivity: 0.004,
  noiseCoupling: 0.5,
  activationUplift: 0.07,
};

// ============================================================================
// 变换
// ============================================================================

export function fidelitySeries(
  model: FidelityModel,
  temperature: number[],
  noise: number[],
  activationMask: boolean[],
): number[] {
  const n = temperature.length;
  if (noise.length !== n || activationMask.length !== n) {
    throw new ValidationError('Fidelity inputs must have equal length', {
      technology: model.technology,
      temperature: n,
      noise: noise.length,
      activationMask: activationMask.length,
    });
  }

  const out = new Array<number>(n);
  for (let t = 0; t < n; t++) {
    let value = model.baseline
      - (temperature[t] - REFERENCE_TEMPERATURE_C) * model.temperatureSensitivity
      + noise[t] * model.noiseCoupling;
    if (activationMask[t]) value += model.activationUplift;
    out[t] = clip(value, 0, 1);
  }
  return out;
}
