/**
 * 确定性伪随机数生成器
 *
 * 每个仿真引擎持有独立实例，不存在进程级共享的随机状态：
 * 同一种子构造的两个实例产生逐位相同的序列。
 *
 * 均匀分布: Mulberry32（32 位整数状态，Math.imul 保证跨平台一致）
 * 正态分布: Box-Muller 变换
 */

/** 种子上限：状态为 32 位无符号整数，合法种子为 [0, MAX_SEED] */
export const MAX_SEED = 0xffffffff;

export class PRNG {
  private state: number;

  /** 调用方负责保证 seed ∈ [0, MAX_SEED]（仿真配置校验时拒绝越界种子） */
  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** [0, 1) 均匀分布 */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** N(mean, stdDev²) 正态分布 */
  gaussian(mean = 0, stdDev = 1): number {
    // u1 ∈ (0, 1]，避免 log(0)
    const u1 = 1 - this.next();
    const u2 = this.next();
    return mean + stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  /** 复制当前状态（不影响原实例的后续序列） */
  clone(): PRNG {
    const copy = new PRNG(0);
    copy.state = this.state;
    return copy;
  }
}
