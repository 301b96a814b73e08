/**
 * 激活前后统计摘要测试
 */
import { describe, it, expect } from 'vitest';
import { summarizeActivation, formatActivationReport } from '../activation-report';
import { QubitSimulationEngine } from '../simulation-engine';
import type { SimulationResult } from '../simulation.types';

function syntheticResult(fidelityA: number[], fidelityB: number[]): SimulationResult {
  const days = fidelityA.map((_, t) => t / 2);
  return {
    days,
    fidelityA,
    fidelityB,
    temperature: days.map(() => 15),
    noise: days.map(() => 0),
    activationMask: days.map(day => day >= 1),
  };
}

describe('summarizeActivation', () => {
  it('按激活日划分前后窗口并计算百分比变化', () => {
    const report = summarizeActivation(syntheticResult([0.5, 0.5, 0.75, 0.75], [0.8, 0.8, 0.88, 0.88]), 1);

    expect(report.preTicks).toBe(2);
    expect(report.postTicks).toBe(2);

    const [sc, ti] = report.technologies;
    expect(sc.technology).toBe('SC');
    expect(sc.label).toBe('Superconducting Qubits (SC)');
    expect(sc.preMean).toBe(0.5);
    expect(sc.postMean).toBe(0.75);
    expect(sc.gainPercent).toBeCloseTo(50, 10);

    expect(ti.technology).toBe('TI');
    expect(ti.gainPercent).toBeCloseTo(10, 10);
  });

  it('激活前窗口为空时增益为 null', () => {
    const report = summarizeActivation(syntheticResult([0.5, 0.6], [0.8, 0.9]), 0);
    expect(report.preTicks).toBe(0);
    expect(report.technologies[0].preMean).toBeNull();
    expect(report.technologies[0].postMean).toBeCloseTo(0.55, 12);
    expect(report.technologies[0].gainPercent).toBeNull();
  });

  it('激活后窗口为空时增益为 null', () => {
    const report = summarizeActivation(syntheticResult([0.5, 0.6], [0.8, 0.9]), 5);
    expect(report.postTicks).toBe(0);
    expect(report.technologies[1].postMean).toBeNull();
    expect(report.technologies[1].gainPercent).toBeNull();
  });

  it('激活前均值为 0 时增益为 null', () => {
    const report = summarizeActivation(syntheticResult([0, 0, 0.5, 0.5], [0.8, 0.8, 0.9, 0.9]), 1);
    expect(report.technologies[0].preMean).toBe(0);
    expect(report.technologies[0].gainPercent).toBeNull();
  });

  it('真实运行：(120, 75, 42) 两种技术增益为正', () => {
    const engine = new QubitSimulationEngine({ durationDays: 120, activationDay: 75, seed: 42 });
    const report = summarizeActivation(engine.run(), 75);
    expect(report.preTicks).toBe(1800);
    expect(report.postTicks).toBe(1080);
    for (const tech of report.technologies) {
      expect(tech.gainPercent).not.toBeNull();
      expect(tech.gainPercent ?? 0).toBeGreaterThan(0);
    }
  });
});

describe('formatActivationReport', () => {
  it('输出一位小数的纯文本摘要', () => {
    const report = summarizeActivation(syntheticResult([0.5, 0.5, 0.75, 0.75], [0.8, 0.8, 0.88, 0.88]), 1);
    expect(formatActivationReport(report).split('\n')).toEqual([
      'Simulation Summary (activation at day 1)',
      '  SC Qubits: 50.0% mean fidelity improvement after activation',
      '  TI Qubits: 10.0% mean fidelity improvement after activation',
      'Interpretation: SC systems benefit strongly from error correction but remain '
        + 'temperature-sensitive, while TI systems exhibit superior intrinsic stability.',
    ]);
  });

  it('增益缺失时显示 n/a', () => {
    const report = summarizeActivation(syntheticResult([0.5, 0.6], [0.8, 0.9]), 0);
    const lines = formatActivationReport(report).split('\n');
    expect(lines[1]).toBe('  SC Qubits: n/a mean fidelity improvement after activation');
    expect(lines[2]).toBe('  TI Qubits: n/a mean fidelity improvement after activation');
  });
});
