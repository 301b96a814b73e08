/**
 * ============================================================================
 * 量子比特保真度仿真 — 类型定义
 * ============================================================================
 *
 * 两种硬件路线：
 *   - A = SC: 超导量子比特 (Superconducting)
 *   - B = TI: 离子阱量子比特 (Trapped-Ion)
 *
 * 时间轴为小时分辨率，tick t 对应第 t / 24 天。
 */

export type QubitTechnology = 'SC' | 'TI';

/** 构造参数（seed 可省略，默认 42） */
export interface SimulationConfigInput {
  /** 仿真时长（天），正整数 */
  durationDays: number;
  /** 纠错激活日，[0, durationDays] 内的整数 */
  activationDay: number;
  /** 随机种子 */
  seed?: number;
}

/** 校验后的不可变配置 */
export interface SimulationConfig {
  readonly durationDays: number;
  readonly activationDay: number;
  readonly seed: number;
  /** durationDays × 24 */
  readonly ticks: number;
}

/**
 * 单种硬件路线的保真度模型常量
 *
 * value = baseline − (temp − 15)·temperatureSensitivity + noise·noiseCoupling
 *         (+ activationUplift，激活后)
 */
export interface FidelityModel {
  readonly technology: QubitTechnology;
  readonly label: string;
  readonly baseline: number;
  readonly temperatureSensitivity: number;
  readonly noiseCoupling: number;
  readonly activationUplift: number;
}

/** 单次运行的输出，所有序列等长（ticks） */
export interface SimulationResult {
  /** 天数轴 tick / 24 */
  days: number[];
  /** 技术 A (SC) 保真度，∈ [0, 1] */
  fidelityA: number[];
  /** 技术 B (TI) 保真度，∈ [0, 1] */
  fidelityB: number[];
  /** 环境温度 (°C) */
  temperature: number[];
  /** 两种技术共用的相关噪声（已乘 0.02） */
  noise: number[];
  /** day ≥ activationDay */
  activationMask: boolean[];
}
