/**
 * 纠错激活前后的保真度统计摘要
 *
 * gainPercent = (postMean − preMean) / preMean × 100
 * 激活窗口为空（激活日为 0 或等于时长）或 preMean 为 0 时返回 null
 */

import { mean } from '../algorithms/_core/dsp';
import { SUPERCONDUCTING_MODEL, TRAPPED_ION_MODEL } from './fidelity-model';
import type { FidelityModel, QubitTechnology, SimulationResult } from './simulation.types';

export interface TechnologyActivationSummary {
  technology: QubitTechnology;
  label: string;
  preMean: number | null;
  postMean: number | null;
  gainPercent: number | null;
}

export interface ActivationReport {
  activationDay: number;
  preTicks: number;
  postTicks: number;
  technologies: TechnologyActivationSummary[];
}

const INTERPRETATION =
  'Interpretation: SC systems benefit strongly from error correction but remain '
  + 'temperature-sensitive, while TI systems exhibit superior intrinsic stability.';

function meanOrNull(values: number[]): number | null {
  return values.length > 0 ? mean(values) : null;
}

function summarize(
  model: FidelityModel,
  series: number[],
  days: number[],
  activationDay: number,
): TechnologyActivationSummary {
  const preMean = meanOrNull(series.filter((_, t) => days[t] < activationDay));
  const postMean = meanOrNull(series.filter((_, t) => days[t] >= activationDay));
  const gainPercent = preMean !== null && postMean !== null && preMean !== 0
    ? (postMean - preMean) / preMean * 100
    : null;

  return { technology: model.technology, label: model.label, preMean, postMean, gainPercent };
}

export function summarizeActivation(result: SimulationResult, activationDay: number): ActivationReport {
  const postTicks = result.days.filter(day => day >= activationDay).length;
  return {
    activationDay,
    preTicks: result.days.length - postTicks,
    postTicks,
    technologies: [
      summarize(SUPERCONDUCTING_MODEL, result.fidelityA, result.days, activationDay),
      summarize(TRAPPED_ION_MODEL, result.fidelityB, result.days, activationDay),
    ],
  };
}

export function formatActivationReport(report: ActivationReport): string {
  const lines = [`Simulation Summary (activation at day ${report.activationDay})`];
  for (const tech of report.technologies) {
    const gain = tech.gainPercent === null ? 'n/a' : `${tech.gainPercent.toFixed(1)}%`;
    lines.push(`  ${tech.technology} Qubits: ${gain} mean fidelity improvement after activation`);
  }
  lines.push(INTERPRETATION);
  return lines.join('\n');
}
