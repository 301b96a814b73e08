import { describe, it, expect } from 'vitest';
import { PRNG } from './prng';
import { mean, std } from '../../algorithms/_core/dsp';

describe('PRNG', () => {
  it('同种子产生逐位相同的序列', () => {
    const a = new PRNG(42);
    const b = new PRNG(42);
    const seqA = Array.from({ length: 50 }, () => a.next());
    const seqB = Array.from({ length: 50 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('不同种子产生不同序列', () => {
    const a = new PRNG(1);
    const b = new PRNG(2);
    expect(a.next()).not.toBe(b.next());
  });

  it('均匀分布落在 [0, 1)', () => {
    const rng = new PRNG(7);
    for (let i = 0; i < 10000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('gaussian 样本均值≈0、标准差≈1', () => {
    const rng = new PRNG(123);
    const samples = Array.from({ length: 20000 }, () => rng.gaussian());
    expect(samples.every(Number.isFinite)).toBe(true);
    expect(Math.abs(mean(samples))).toBeLessThan(0.05);
    expect(Math.abs(std(samples) - 1)).toBeLessThan(0.05);
  });

  it('gaussian 支持均值与标准差参数', () => {
    const a = new PRNG(9);
    const b = new PRNG(9);
    expect(a.gaussian(15, 2)).toBeCloseTo(15 + 2 * b.gaussian(), 12);
  });

  it('clone 复制当前状态且互不影响', () => {
    const rng = new PRNG(5);
    rng.next();
    const copy = rng.clone();
    const fromCopy = [copy.next(), copy.next()];
    expect([rng.next(), rng.next()]).toEqual(fromCopy);
  });

  it('负数种子按无符号 32 位处理', () => {
    expect(new PRNG(-1).next()).toBe(new PRNG(0xffffffff).next());
  });
});
