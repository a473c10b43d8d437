import { readFile } from 'fs/promises';
import { z } from 'zod';
import { issue } from '../schema';
import type { ValidationIssue } from '../types';
import { ConfigurationError } from '../engine/errors';
import { parse_level, type LogLevel } from '../utils/logger.util';
import { build_session_config, type BuildConfigOutput } from './session';

export { build_session_config } from './session';
export type { BuildConfigOutput } from './session';

const blank_to_undefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const RuntimeEnv = z.object({
  ACE_SEED: z.preprocess(blank_to_undefined, z.coerce.number().int().nonnegative().optional()),
  ACE_EPISODES: z.preprocess(blank_to_undefined, z.coerce.number().int().positive().optional()),
  ACE_LOG_LEVEL: z.preprocess(blank_to_undefined, z.string().optional()),
});

export interface RuntimeEnvType {
  seed?: number;
  episodes?: number;
  log_level?: LogLevel;
}

/**
 * 读取运行时环境变量（.env 由入口处的 dotenv 载入）。
 * 非法值抛 ConfigurationError。
 */
export function load_runtime_env(env: Record<string, string | undefined> = process.env): RuntimeEnvType {
  const r = RuntimeEnv.safeParse(env);
  if (!r.success) {
    throw new ConfigurationError(r.error.issues.map((e) => issue('ENV_ERROR', '/' + e.path.join('/'), e.message)));
  }
  const out: RuntimeEnvType = {};
  if (r.data.ACE_SEED !== undefined) out.seed = r.data.ACE_SEED;
  if (r.data.ACE_EPISODES !== undefined) out.episodes = r.data.ACE_EPISODES;
  if (r.data.ACE_LOG_LEVEL !== undefined) {
    const level = parse_level(r.data.ACE_LOG_LEVEL);
    if (!level) {
      throw new ConfigurationError([
        issue('ENV_ERROR', '/ACE_LOG_LEVEL', `unknown log level '${r.data.ACE_LOG_LEVEL}'`, 'debug | info | warn | error | silent'),
      ]);
    }
    out.log_level = level;
  }
  return out;
}

/** 读 JSON 配置文件并校验；JSON 本身不合法也归为 ConfigurationError */
export async function load_config_file(path: string): Promise<BuildConfigOutput> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const problems: ValidationIssue[] = [issue('JSON_ERROR', '/', e instanceof Error ? e.message : String(e))];
    throw new ConfigurationError(problems);
  }
  return build_session_config(raw);
}
