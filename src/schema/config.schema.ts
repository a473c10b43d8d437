import { z } from 'zod';
import { AsteroidName, CaptainType, Complexity, Pressure } from './common.schema';

/**
 * 会话配置的结构校验。
 * 每个字段都有默认值（取自原实验参数），调用方只需覆盖想改的部分；
 * 解析后的对象在会话生命周期内只读。
 */

const Cost = z.number().int('成本必须是整数').nonnegative('成本不能为负');
const Probability = z.number().min(0, '概率不能小于 0').max(1, '概率不能大于 1');
const DurationMs = z.number().int().positive('阶段时长必须大于 0');

/** 各小行星的航行成本（按目的地计价） */
const TravelCosts = z
  .object({
    Alpha: Cost.default(0),
    Beta: Cost.default(1),
    Gamma: Cost.default(2),
    Omega: Cost.default(3),
  })
  .strict()
  .default({});

/** 各类行动的 PU 成本 */
const ActionCosts = z
  .object({
    probe: Cost.default(1),
    robot: Cost.default(1),
    mine_shallow: Cost.default(1),
    mine_deep: Cost.default(2),
  })
  .strict()
  .default({});

/** 成功率表的一行：情报组合 → p */
const ProbabilityRow = (d: { none: number; probe_only: number; robot_only: number; probe_plus_robot: number }) =>
  z
    .object({
      none: Probability.default(d.none),
      probe_only: Probability.default(d.probe_only),
      robot_only: Probability.default(d.robot_only),
      probe_plus_robot: Probability.default(d.probe_plus_robot),
    })
    .strict()
    .default({});

/** depth × intel_state 成功率矩阵 */
const ProbabilityMatrix = z
  .object({
    shallow: ProbabilityRow({ none: 0.15, probe_only: 0.35, robot_only: 0.3, probe_plus_robot: 0.55 }),
    deep: ProbabilityRow({ none: 0.3, probe_only: 0.55, robot_only: 0.5, probe_plus_robot: 0.8 }),
  })
  .strict()
  .default({});

/** 各阶段时长（毫秒）；简报时长由 pressure 选择 */
const StageDurations = z
  .object({
    briefing_high: DurationMs.default(90_000),
    briefing_low: DurationMs.default(180_000),
    action: DurationMs.default(15_000),
    result: DurationMs.default(15_000),
  })
  .strict()
  .default({});

/**
 * 次数上限：
 * - round：每回合重新计数
 * - session：整个会话累计（含训练回合）
 */
const Cap = z
  .object({
    limit: z.number().int().nonnegative(),
    scope: z.enum(['round', 'session']),
  })
  .strict();

/** 显式指定的小行星真值（省略则由种子生成） */
const AsteroidSpec = z
  .object({
    max_minerals: z.number().int().nonnegative(),
    shallow_cost: Cost,
    deep_cost: Cost,
  })
  .strict();

export const SessionConfig = z
  .object({
    pressure: Pressure,
    complexity: Complexity,
    captain_type: CaptainType.default('human'),

    /** 每回合全队共享的 PU，回合开始时重置，不结转 */
    pu_per_round: z.number().int().positive('pu_per_round 必须大于 0').default(4),
    travel_costs: TravelCosts,
    action_costs: ActionCosts,
    probability_matrix: ProbabilityMatrix,
    stage_durations_ms: StageDurations,

    /** 计分回合数；另有第 0 回合为训练回合 */
    scored_rounds: z.number().int().min(1).max(50).default(5),

    probe_cap: Cap.default({ limit: 2, scope: 'session' }),
    robot_cap: Cap.default({ limit: 1, scope: 'round' }),

    /**
     * 采矿成功但司钻从未看到探针情报时的产量：
     * - 'true_value'：取小行星真实的 max_minerals
     * - 数字：固定产量
     */
    unprobed_success_yield: z.union([z.literal('true_value'), z.number().int().nonnegative()]).default('true_value'),

    starting_location: AsteroidName.default('Alpha'),
    asteroids: z
      .object({
        Alpha: AsteroidSpec,
        Beta: AsteroidSpec,
        Gamma: AsteroidSpec,
        Omega: AsteroidSpec,
      })
      .strict()
      .optional(),

    /** 简报留言 */
    message_max_length: z.number().int().positive().default(300),
    message_log_capacity: z.number().int().positive().default(200),
  })
  .strict();

/** 调用方传入的形状（大部分字段可省略） */
export type SessionConfigInput = z.input<typeof SessionConfig>;
/** 解析后的完整配置 */
export type SessionConfigType = z.infer<typeof SessionConfig>;

/** 安全解析：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_session_config(input: unknown) {
  return SessionConfig.safeParse(input);
}
