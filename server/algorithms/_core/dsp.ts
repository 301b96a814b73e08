/**
 * DSP 工具库 — 数字信号处理基础函数
 *
 * 提供复数运算、FFT/IFFT、任意长度 DFT、实数 FFT（rfft/irfft）与统计函数
 * 噪声整形等频域算法的底层数学计算依赖此模块
 *
 * 参考标准:
 * - Cooley-Tukey FFT (1965)
 * - Bluestein chirp-z 变换 (1970)
 * - rfft / irfft 约定：正变换不归一化，逆变换乘以 1/N
 */

import { ValidationError, ErrorCode } from '../../core/errors';

// ============================================================
// 1. 复数运算
// ============================================================

export interface Complex {
  re: number;
  im: number;
}

export function complexAdd(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function complexSub(a: Complex, b: Complex): Complex {
  return { re: a.re - b.re, im: a.im - b.im };
}

export function complexMul(a: Complex, b: Complex): Complex {
  return {
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  };
}

export function complexScale(c: Complex, k: number): Complex {
  return { re: c.re * k, im: c.im * k };
}

export function complexAbs(c: Complex): number {
  return Math.sqrt(c.re * c.re + c.im * c.im);
}

export function complexConj(c: Complex): Complex {
  return { re: c.re, im: -c.im };
}

export function complexExp(theta: number): Complex {
  return { re: Math.cos(theta), im: Math.sin(theta) };
}

// ============================================================
// 2. FFT / IFFT (Cooley-Tukey Radix-2)
// ============================================================

/**
 * 将数组长度补齐到2的幂次
 */
export function nextPow2(n: number): number {
  let p = 1;
  while (p < n) p <<= 1;
  return p;
}

export function isPow2(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/**
 * 复数FFT（长度必须为2的幂次）
 */
export function fftComplex(data: Complex[]): Complex[] {
  const N = data.length;
  if (N <= 1) return data.map(c => ({ ...c }));

  // 位反转排列
  const result = bitReverseCopy(data);

  // 蝶形运算
  for (let size = 2; size <= N; size *= 2) {
    const halfSize = size / 2;
    const angle = -2 * Math.PI / size;
    const wn = complexExp(angle);

    for (let i = 0; i < N; i += size) {
      let w: Complex = { re: 1, im: 0 };
      for (let j = 0; j < halfSize; j++) {
        const u = result[i + j];
        const t = complexMul(w, result[i + j + halfSize]);
        result[i + j] = complexAdd(u, t);
        result[i + j + halfSize] = complexSub(u, t);
        w = complexMul(w, wn);
      }
    }
  }

  return result;
}

/**
 * IFFT (逆快速傅里叶变换，长度必须为2的幂次)
 */
export function ifft(spectrum: Complex[]): Complex[] {
  const N = spectrum.length;
  // 取共轭
  const conj = spectrum.map(c => complexConj(c));
  // FFT
  const result = fftComplex(conj);
  // 取共轭并除以N
  return result.map(c => ({ re: c.re / N, im: -c.im / N }));
}

/**
 * 位反转排列
 */
function bitReverseCopy(data: Complex[]): Complex[] {
  const N = data.length;
  const result: Complex[] = new Array(N);
  const bits = Math.log2(N);

  for (let i = 0; i < N; i++) {
    let rev = 0;
    let n = i;
    for (let j = 0; j < bits; j++) {
      rev = (rev << 1) | (n & 1);
      n >>= 1;
    }
    result[rev] = { ...data[i] };
  }

  return result;
}

// ============================================================
// 3. 任意长度 DFT (Bluestein chirp-z)
// ============================================================

/**
 * 任意长度复数 DFT
 * 2的幂次直接走 Radix-2；其余长度改写为循环卷积，用补零到 2^m ≥ 2N-1 的 FFT 计算
 */
export function dft(data: Complex[]): Complex[] {
  const N = data.length;
  if (N <= 1 || isPow2(N)) return fftComplex(data);

  const M = nextPow2(2 * N - 1);

  // chirp w[k] = exp(-iπk²/N)，k² 先对 2N 取模以保持相位精度
  const chirp: Complex[] = new Array(N);
  for (let k = 0; k < N; k++) {
    chirp[k] = complexExp(-Math.PI * ((k * k) % (2 * N)) / N);
  }

  const a: Complex[] = Array.from({ length: M }, () => ({ re: 0, im: 0 }));
  const b: Complex[] = Array.from({ length: M }, () => ({ re: 0, im: 0 }));
  for (let k = 0; k < N; k++) {
    a[k] = complexMul(data[k], chirp[k]);
  }
  b[0] = complexConj(chirp[0]);
  for (let k = 1; k < N; k++) {
    b[k] = complexConj(chirp[k]);
    b[M - k] = complexConj(chirp[k]);
  }

  const A = fftComplex(a);
  const B = fftComplex(b);
  const conv = ifft(A.map((c, i) => complexMul(c, B[i])));

  return chirp.map((w, k) => complexMul(conv[k], w));
}

/**
 * 任意长度逆 DFT（乘以 1/N）
 */
export function idft(spectrum: Complex[]): Complex[] {
  const N = spectrum.length;
  if (N === 0) return [];
  const result = dft(spectrum.map(c => complexConj(c)));
  return result.map(c => ({ re: c.re / N, im: -c.im / N }));
}

// ============================================================
// 4. 实数 FFT
// ============================================================

/**
 * 实数输入 DFT，返回非负频率 bin 0..⌊N/2⌋
 */
export function rfft(signal: number[]): Complex[] {
  if (signal.length === 0) return [];
  const spectrum = dft(signal.map(v => ({ re: v, im: 0 })));
  return spectrum.slice(0, Math.floor(signal.length / 2) + 1);
}

/**
 * rfft 的逆变换，输出长度为 n 的实数序列
 * 按 Hermitian 对称补全负频率；DC 与（偶数 n 的）Nyquist bin 只取实部
 */
export function irfft(spectrum: Complex[], n: number): number[] {
  if (n === 0) return [];
  const bins = Math.floor(n / 2) + 1;
  if (spectrum.length < bins) {
    throw new ValidationError(
      `irfft needs ${bins} spectrum bins for length ${n}, got ${spectrum.length}`,
      { n, bins: spectrum.length },
      ErrorCode.INVALID_INPUT,
    );
  }

  const full: Complex[] = new Array(n);
  for (let k = 0; k < bins; k++) {
    const c = spectrum[k];
    const realOnly = k === 0 || (n % 2 === 0 && k === n / 2);
    full[k] = realOnly ? { re: c.re, im: 0 } : { re: c.re, im: c.im };
  }
  for (let k = bins; k < n; k++) {
    full[k] = complexConj(full[n - k]);
  }

  return idft(full).map(c => c.re);
}

/**
 * rfft 对应的采样频率轴: f[k] = k / (n·d)，k = 0..⌊n/2⌋
 * @param d 采样间隔，默认 1
 */
export function rfftfreq(n: number, d = 1): number[] {
  const bins = Math.floor(n / 2) + 1;
  return Array.from({ length: bins }, (_, k) => k / (n * d));
}

/**
 * 单边功率谱 |X[k]|²（未归一化）
 */
export function powerSpectrum(signal: number[]): number[] {
  return rfft(signal).map(c => c.re * c.re + c.im * c.im);
}

// ============================================================
// 5. 统计函数
// ============================================================

export function mean(data: number[]): number {
  return data.reduce((s, v) => s + v, 0) / data.length;
}

export function variance(data: number[]): number {
  const m = mean(data);
  return data.reduce((s, v) => s + (v - m) ** 2, 0) / data.length;
}

export function std(data: number[]): number {
  return Math.sqrt(variance(data));
}

/** 逐元素截断到 [lo, hi] */
export function clip(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}
