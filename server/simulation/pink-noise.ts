/**
 * 1/f (pink) 相关噪声生成 — 频域整形
 *
 * 白噪声 → rfft → 每个 bin 除以 √f[k] → irfft
 * f[0] 固定为 1.0：DC 分量原样保留，不被放大到无穷
 * 输出不做幅值归一化
 */

import { rfft, irfft, rfftfreq, complexScale } from '../algorithms/_core/dsp';
import { ValidationError, ErrorCode } from '../core/errors';
import type { PRNG } from '../lib/math/prng';

/** 运行时对 pink noise 施加的固定比例 */
export const NOISE_SCALE = 0.02;

export function pinkNoise(n: number, rng: PRNG): number[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(`pinkNoise length must be a non-negative integer, got ${n}`, { n }, ErrorCode.OUT_OF_RANGE);
  }
  if (n === 0) return [];

  const white = Array.from({ length: n }, () => rng.gaussian());

  const f = rfftfreq(n);
  f[0] = 1.0;

  const spectrum = rfft(white).map((c, k) => complexScale(c, 1 / Math.sqrt(f[k])));
  return irfft(spectrum, n);
}
