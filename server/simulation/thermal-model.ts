/**
 * 环境温度模型：日周期正弦 + 逐 tick 独立高斯扰动
 *   temp[t] = 15 + 5·sin(2πt/24) + N(0, 1)
 */

import type { PRNG } from '../lib/math/prng';
import { HOURS_PER_DAY } from './simulation-config';

/** 基准温度 (°C)，保真度模型以此为零点 */
export const REFERENCE_TEMPERATURE_C = 15;
/** 日周期振幅 (°C) */
export const DIURNAL_AMPLITUDE_C = 5;

export function ambientTemperature(ticks: number, rng: PRNG): number[] {
  const temp = new Array<number>(ticks);
  for (let t = 0; t < ticks; t++) {
    temp[t] = REFERENCE_TEMPERATURE_C
      + DIURNAL_AMPLITUDE_C * Math.sin(2 * Math.PI * t / HOURS_PER_DAY)
      + rng.gaussian();
  }
  return temp;
}
