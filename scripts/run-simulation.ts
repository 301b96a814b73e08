#!/usr/bin/env tsx
/**
 * 量子比特保真度仿真 — 命令行入口
 *
 * 用法:
 *   npx tsx scripts/run-simulation.ts [--days <n>] [--activation-day <n>] [--json]
 */

import { runSimulationCli } from '../server/simulation/simulation-cli';

runSimulationCli(process.argv.slice(2));
