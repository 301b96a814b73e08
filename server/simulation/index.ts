/**
 * Simulation 模块导出
 * QubitSimulationEngine — 量子比特保真度仿真引擎
 */
export { QubitSimulationEngine } from './simulation-engine';
export { PRNG } from '../lib/math/prng';
export { createSimulationConfig, HOURS_PER_DAY, DEFAULT_SEED } from './simulation-config';
export { pinkNoise, NOISE_SCALE } from './pink-noise';
export { ambientTemperature, REFERENCE_TEMPERATURE_C, DIURNAL_AMPLITUDE_C } from './thermal-model';
export { fidelitySeries, SUPERCONDUCTING_MODEL, TRAPPED_ION_MODEL } from './fidelity-model';
export { summarizeActivation, formatActivationReport } from './activation-report';
export type { ActivationReport, TechnologyActivationSummary } from './activation-report';
export type {
  QubitTechnology,
  SimulationConfigInput,
  SimulationConfig,
  FidelityModel,
  SimulationResult,
} from './simulation.types';
