/**
 * 采矿结果判定
 * ------------
 * 由 depth × intel_state 查成功率 p，从会话的种子 RNG 抽一次 [0,1) 均匀数，draw < p 即成功。
 * 纯函数：不改入参，返回结果与推进后的 RNG 状态；同一 rng_state 必然得到同一结果。
 */
import type { DepthType, IntelStateType, SessionConfigType } from '../schema';
import type { AsteroidStateType, MiningOutcomeType } from '../types';
import { mulberry32 } from '../utils/rng.util';

export type ProbabilityMatrix = SessionConfigType['probability_matrix'];
export type UnprobedYield = SessionConfigType['unprobed_success_yield'];

export function intel_state_of(probe: boolean, robot: boolean): IntelStateType {
  if (probe && robot) return 'probe_plus_robot';
  if (probe) return 'probe_only';
  if (robot) return 'robot_only';
  return 'none';
}

export function success_probability(matrix: ProbabilityMatrix, depth: DepthType, intel_state: IntelStateType): number {
  return matrix[depth][intel_state];
}

/** 成功时的产量：看到过探针情报 → 真值；否则按配置的兜底 */
export function success_yield(asteroid: AsteroidStateType, intel_state: IntelStateType, fallback: UnprobedYield): number {
  const probed = intel_state === 'probe_only' || intel_state === 'probe_plus_robot';
  if (probed || fallback === 'true_value') return asteroid.max_minerals;
  return fallback;
}

export interface ResolveMiningInput {
  round: number;
  asteroid: AsteroidStateType;
  depth: DepthType;
  intel_state: IntelStateType;
  matrix: ProbabilityMatrix;
  /** 会话 RNG 当前状态（uint32） */
  rng_state: number;
  /** 已经从账本扣掉的成本，只做记录 */
  cost_paid: number;
  unprobed_success_yield: UnprobedYield;
}

export interface ResolveMiningOutput {
  outcome: MiningOutcomeType;
  rng_state: number;
}

export function resolve_mining(input: ResolveMiningInput): ResolveMiningOutput {
  const p = success_probability(input.matrix, input.depth, input.intel_state);
  const rng = mulberry32(input.rng_state);
  // 每次采矿只抽一次，不重试
  const draw = rng.next_float();
  const success = draw < p;

  const outcome: MiningOutcomeType = {
    round: input.round,
    asteroid: input.asteroid.name,
    depth: input.depth,
    intel_state: input.intel_state,
    probability: p,
    draw,
    success,
    minerals_gained: success ? success_yield(input.asteroid, input.intel_state, input.unprobed_success_yield) : 0,
    cost_paid: input.cost_paid,
  };

  return { outcome, rng_state: rng.state };
}
