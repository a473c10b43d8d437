import { z } from 'zod';

/**
 * 引擎里反复出现的枚举。类型一律由 zod 推导，保证运行期校验与静态类型同源。
 */

/** 船员三个固定席位 */
export const Role = z.enum(['captain', 'navigator', 'driller']);
export type RoleType = z.infer<typeof Role>;
export const ROLES = Role.options;

/** 能提交行动的席位（船长只参与沟通） */
export const ActingRole = z.enum(['navigator', 'driller']);
export type ActingRoleType = z.infer<typeof ActingRole>;
export const ACTING_ROLES = ActingRole.options;

/** 小行星 */
export const AsteroidName = z.enum(['Alpha', 'Beta', 'Gamma', 'Omega']);
export type AsteroidNameType = z.infer<typeof AsteroidName>;
export const ASTEROID_NAMES = AsteroidName.options;

/** 采矿深度 */
export const Depth = z.enum(['shallow', 'deep']);
export type DepthType = z.infer<typeof Depth>;

/** 回合内阶段 */
export const Stage = z.enum(['briefing', 'action', 'result']);
export type StageType = z.infer<typeof Stage>;

/** 情报种类：探针揭示矿藏上限，机器人揭示两种开采成本 */
export const IntelKind = z.enum(['max_minerals', 'shallow_cost', 'deep_cost']);
export type IntelKindType = z.infer<typeof IntelKind>;

/** 采矿时司钻可见的情报组合，决定成功率查表的列 */
export const IntelState = z.enum(['none', 'probe_only', 'robot_only', 'probe_plus_robot']);
export type IntelStateType = z.infer<typeof IntelState>;
export const INTEL_STATES = IntelState.options;

/** 实验条件 */
export const Pressure = z.enum(['high', 'low']);
export const Complexity = z.enum(['high', 'low']);
export const CaptainType = z.enum(['human', 'llm']);
export type PressureType = z.infer<typeof Pressure>;
export type ComplexityType = z.infer<typeof Complexity>;
export type CaptainTypeType = z.infer<typeof CaptainType>;
