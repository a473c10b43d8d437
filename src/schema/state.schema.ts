import { z } from 'zod';
import {
  ActingRole,
  AsteroidName,
  Depth,
  IntelKind,
  IntelState,
  Role,
  Stage,
} from './common.schema';
import { Action } from './action.schema';
import { SessionConfig } from './config.schema';

/**
 * 会话运行期状态的结构。
 * 同一份 schema 既推导运行期类型，也用于校验重启后读回的快照。
 */

const Int = z.number().int();

/** 小行星的完整真值（hidden 字段只有通过情报才对玩家可见） */
export const AsteroidState = z.object({
  name: AsteroidName,
  travel_cost: Int.nonnegative(),
  max_minerals: Int.nonnegative(),
  shallow_cost: Int.nonnegative(),
  deep_cost: Int.nonnegative(),
  mined: z.boolean(),
  mined_round: Int.nullable(),
});

/** 一条情报：只追加，不覆盖；可见性按需计算 */
export const IntelFact = z.object({
  asteroid: AsteroidName,
  kind: IntelKind,
  value: Int,
  discoverer: Role,
  round: Int.nonnegative(),
});

/** 已受理（或截止时自动补齐）的行动 */
export const PendingAction = z.object({
  role: ActingRole,
  action: Action,
  cost: Int.nonnegative(),
  submitted_at: z.number(),
  /** 截止时自动补上的 No-Op */
  auto: z.boolean(),
});

export const MiningOutcome = z.object({
  round: Int.nonnegative(),
  asteroid: AsteroidName,
  depth: Depth,
  intel_state: IntelState,
  probability: z.number(),
  draw: z.number(),
  success: z.boolean(),
  minerals_gained: Int.nonnegative(),
  cost_paid: Int.nonnegative(),
});

/** 结算时因前提失效而跳过的效果 */
export const SkippedEffect = z.object({
  role: ActingRole,
  kind: z.string(),
  reason: z.string(),
  message: z.string(),
});

export const RoundOutcome = z.object({
  round: Int.nonnegative(),
  scored: z.boolean(),
  location_before: AsteroidName,
  location_after: AsteroidName,
  committed: z.object({ navigator: PendingAction, driller: PendingAction }),
  pu_spent: z.object({ navigator: Int.nonnegative(), driller: Int.nonnegative() }),
  remaining_pu: Int.nonnegative(),
  intel_recorded: z.array(IntelFact),
  mining: MiningOutcome.nullable(),
  skipped: z.array(SkippedEffect),
});

export const ChatMessage = z.object({
  round: Int.nonnegative(),
  from: Role,
  to: z.union([Role, z.literal('crew')]),
  text: z.string(),
  at: z.number(),
});

export const CrewAnalytics = z.object({
  /** 仅统计计分回合 */
  cumulative_minerals: Int.nonnegative(),
  training_minerals: Int.nonnegative(),
  cumulative_pu_team: Int.nonnegative(),
  cumulative_pu: z.object({ captain: Int.nonnegative(), navigator: Int.nonnegative(), driller: Int.nonnegative() }),
  probes_used: Int.nonnegative(),
  robots_used: Int.nonnegative(),
});

export const LedgerState = z.object({
  budget: Int.positive(),
  remaining: Int.nonnegative(),
  holds: z.object({ navigator: Int.nonnegative(), driller: Int.nonnegative() }),
  spent: z.object({ navigator: Int.nonnegative(), driller: Int.nonnegative() }),
});

export const RoundState = z.object({
  number: Int.nonnegative(),
  stage: Stage,
  stage_started_at: z.number(),
  deadline: z.number(),
  pending: z.object({ navigator: PendingAction.nullable(), driller: PendingAction.nullable() }),
  ledger: LedgerState,
  messages: z.array(ChatMessage),
  outcome: RoundOutcome.nullable(),
});

export const SessionStatus = z.enum(['waiting', 'running', 'complete', 'aborted']);

export const SessionState = z.object({
  crew_id: z.string().min(1),
  seed: Int,
  config: SessionConfig,
  status: SessionStatus,
  location: AsteroidName,
  asteroids: z.object({ Alpha: AsteroidState, Beta: AsteroidState, Gamma: AsteroidState, Omega: AsteroidState }),
  intel: z.array(IntelFact),
  rng_state: Int.nonnegative(),
  analytics: CrewAnalytics,
  round: RoundState.nullable(),
  history: z.array(RoundOutcome),
  abort_reason: z.string().nullable(),
  /** 终止时正在进行的回合号；未终止或开局前终止为 null */
  aborted_in_round: Int.nonnegative().nullable(),
});

export const SessionSnapshot = z.object({
  snapshot_version: z.literal(1),
  state_hash: z.string().startsWith('sha256:'),
  session: SessionState,
});

export function parse_snapshot(input: unknown) {
  return SessionSnapshot.safeParse(input);
}
