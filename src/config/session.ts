import { ASTEROID_NAMES, issue, parse_session_config, type SessionConfigType } from '../schema';
import type { ValidationIssue } from '../types';
import { ConfigurationError } from '../engine/errors';
import { logger } from '../utils/logger.util';

export interface BuildConfigOutput {
  config: SessionConfigType;
  /** 非致命告警：配置能跑，但某些行动永远负担不起 */
  warnings: ValidationIssue[];
}

/**
 * 解析并校验会话配置。
 * 结构问题（zod）→ 抛 ConfigurationError，携带全部问题；
 * 预算层面的可疑之处 → warnings，并记日志。
 */
export function build_session_config(input: unknown): BuildConfigOutput {
  const result = parse_session_config(input ?? {});
  if (!result.success) {
    // 把 Zod 的 issues 转成 ValidationIssue[]
    const errors = result.error.issues.map((e) =>
      issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message),
    );
    throw new ConfigurationError(errors);
  }

  const config = result.data;
  const warnings: ValidationIssue[] = [];
  const budget = config.pu_per_round;

  for (const [key, cost] of Object.entries(config.action_costs)) {
    if (cost > budget) {
      warnings.push(
        issue('ACTION_UNAFFORDABLE', `/action_costs/${key}`, `cost ${cost} exceeds pu_per_round ${budget}`, '该行动永远无法被受理'),
      );
    }
  }
  for (const name of ASTEROID_NAMES) {
    const cost = config.travel_costs[name];
    if (cost > budget) {
      warnings.push(
        issue('DESTINATION_UNREACHABLE', `/travel_costs/${name}`, `travel cost ${cost} exceeds pu_per_round ${budget}`),
      );
    }
  }
  if (warnings.length) {
    logger.warn('session_config_warnings', { warnings: warnings.map((w) => `${w.code} ${w.path}`) });
  }

  return { config, warnings };
}
