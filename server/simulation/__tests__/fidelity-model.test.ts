/**
 * 保真度变换测试
 */
import { describe, it, expect } from 'vitest';
import { fidelitySeries, SUPERCONDUCTING_MODEL, TRAPPED_ION_MODEL } from '../fidelity-model';
import { ValidationError } from '../../core/errors';

describe('fidelitySeries', () => {
  it('基准温度、零噪声时等于 baseline', () => {
    expect(fidelitySeries(SUPERCONDUCTING_MODEL, [15], [0], [false])[0]).toBeCloseTo(0.70, 12);
    expect(fidelitySeries(TRAPPED_ION_MODEL, [15], [0], [false])[0]).toBeCloseTo(0.85, 12);
  });

  it('温度升高按灵敏度降低保真度', () => {
    // SC: 0.70 − 5·0.012 = 0.64；TI: 0.85 − 5·0.004 = 0.83
    expect(fidelitySeries(SUPERCONDUCTING_MODEL, [20], [0], [false])[0]).toBeCloseTo(0.64, 12);
    expect(fidelitySeries(TRAPPED_ION_MODEL, [20], [0], [false])[0]).toBeCloseTo(0.83, 12);
  });

  it('噪声耦合系数：SC 1.0，TI 0.5', () => {
    expect(fidelitySeries(SUPERCONDUCTING_MODEL, [15], [0.1], [false])[0]).toBeCloseTo(0.80, 12);
    expect(fidelitySeries(TRAPPED_ION_MODEL, [15], [0.1], [false])[0]).toBeCloseTo(0.90, 12);
  });

  it('激活掩码为真时叠加阶跃增益', () => {
    const sc = fidelitySeries(SUPERCONDUCTING_MODEL, [15, 15], [0, 0], [false, true]);
    const ti = fidelitySeries(TRAPPED_ION_MODEL, [15, 15], [0, 0], [false, true]);
    expect(sc[1] - sc[0]).toBeCloseTo(0.22, 12);
    expect(ti[1] - ti[0]).toBeCloseTo(0.07, 12);
  });

  it('越界值被截断到 [0, 1]', () => {
    // 200°C: SC 0.70 − 185·0.012 < 0；−100°C: SC 0.70 + 115·0.012 > 1
    const temps = [200, -100, 15];
    const noise = [0, 0, 5];
    const mask = [true, true, false];
    expect(fidelitySeries(SUPERCONDUCTING_MODEL, temps, noise, mask)).toEqual([0, 1, 1]);
    expect(fidelitySeries(TRAPPED_ION_MODEL, [15, 15], [-10, 10], [false, false])).toEqual([0, 1]);
  });

  it('输入长度不一致抛出 ValidationError', () => {
    expect(() => fidelitySeries(SUPERCONDUCTING_MODEL, [15, 15], [0], [false, false])).toThrow(ValidationError);
    expect(() => fidelitySeries(SUPERCONDUCTING_MODEL, [15], [0], [])).toThrow(ValidationError);
  });
});
