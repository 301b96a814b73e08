/**
 * 命令行入口逻辑
 *
 * 用法:
 *   npx tsx scripts/run-simulation.ts                          # 默认 120 天，第 75 天激活
 *   npx tsx scripts/run-simulation.ts --days 30 --activation-day 10
 *   npx tsx scripts/run-simulation.ts --json                   # JSON 输出
 *
 * 种子取自配置（SIM_SEED，默认 42），不从命令行读取。
 * 报告写 stdout，日志写 stderr。
 * 构造或运行中的任何错误在此捕获，以纯文本输出，不设置专门的退出码。
 */

import '../core/env-loader';
import { config } from '../core/config';
import { validateConfigWithSchema } from '../core/config-schema';
import { InvalidConfigurationError, wrapError } from '../core/errors';
import { configureLogger, logger } from '../core/logger';
import { QubitSimulationEngine } from './simulation-engine';
import { summarizeActivation, formatActivationReport } from './activation-report';

const log = logger.child('cli');

export interface CliOptions {
  durationDays: number;
  activationDay: number;
  json: boolean;
}

/** 缺省值之外的非数字参数保留为 NaN，由仿真配置校验报告 */
export function parseCliArgs(
  argv: string[],
  defaults: { durationDays: number; activationDay: number },
): CliOptions {
  const flagValue = (name: string): number | undefined => {
    const idx = argv.indexOf(name);
    if (idx === -1) return undefined;
    const raw = argv[idx + 1];
    return raw === undefined ? NaN : Number(raw);
  };

  return {
    durationDays: flagValue('--days') ?? defaults.durationDays,
    activationDay: flagValue('--activation-day') ?? defaults.activationDay,
    json: argv.includes('--json'),
  };
}

export function runSimulationCli(
  argv: string[],
  write: (line: string) => void = line => process.stdout.write(line + '\n'),
): void {
  try {
    const validation = validateConfigWithSchema(config);
    if (!validation.data) {
      throw new InvalidConfigurationError(validation.errors.join('; '), { errors: validation.errors });
    }
    const { app, simulation } = validation.data;
    configureLogger({ level: app.logLevel, pretty: app.env !== 'production' });

    const options = parseCliArgs(argv, simulation);
    const engine = new QubitSimulationEngine({
      durationDays: options.durationDays,
      activationDay: options.activationDay,
      seed: simulation.seed,
    });

    const result = engine.run();
    const report = summarizeActivation(result, engine.config.activationDay);
    write(options.json ? JSON.stringify(report, null, 2) : formatActivationReport(report));

    log.info({ app: app.name, version: app.version, ...engine.config }, 'Simulation complete');
  } catch (err) {
    const error = wrapError(err);
    log.error({ code: error.code, context: error.context }, error.message);
    write(`Execution error: ${error.message}`);
  }
}
