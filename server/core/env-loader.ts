/**
 * Qubit Drift Simulator — dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env（通用默认）
 *   2. .env.development / .env.production（按 NODE_ENV 选择）
 *   3. .env.local（个人覆盖，不提交到 Git）
 * 已存在的进程环境变量始终优先，不会被文件覆盖。
 *
 * 注意：此文件必须在 config.ts 之前执行（side-effect import）。
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = resolve(fileURLToPath(new URL('.', import.meta.url)), '../../');

const processKeys = new Set(Object.keys(process.env));

function loadIfExists(filePath: string): boolean {
  const fullPath = resolve(ROOT, filePath);
  if (!existsSync(fullPath)) return false;

  const { parsed } = dotenvConfig({ path: fullPath, processEnv: {} });
  for (const [key, value] of Object.entries(parsed ?? {})) {
    if (!processKeys.has(key)) process.env[key] = value;
  }
  return true;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const loaded: string[] = [];

for (const file of ['.env', `.env.${nodeEnv}`, '.env.local']) {
  if (loadIfExists(file)) loaded.push(file);
}

// 使用 console 而非 logger（logger 须在 .env 加载之后才初始化）
if (loaded.length > 0 && process.env.LOG_LEVEL === 'debug') {
  console.debug(`[env-loader] Loaded config files: ${loaded.join(' → ')}`);
}

export { loaded as loadedEnvFiles };
