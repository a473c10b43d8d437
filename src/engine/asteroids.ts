import type { AsteroidNameType, SessionConfigType } from '../schema';
import type { AsteroidStateType } from '../types';
import { mix_seed, mulberry32, next_int } from '../utils/rng.util';

/** 与采矿抽签分开的子种子，保证生成小行星不占用采矿的随机序列 */
const ASTEROID_SALT = 0xa57e;

type Range = readonly [number, number];

/** 各小行星真值的取值范围；Alpha 的开采成本固定 */
const GENERATION_RANGES: Record<AsteroidNameType, { max_minerals: Range; shallow_cost: Range; deep_cost: Range }> = {
  Alpha: { max_minerals: [50, 100], shallow_cost: [1, 1], deep_cost: [2, 2] },
  Beta: { max_minerals: [60, 120], shallow_cost: [1, 3], deep_cost: [2, 4] },
  Gamma: { max_minerals: [70, 140], shallow_cost: [1, 3], deep_cost: [2, 4] },
  Omega: { max_minerals: [80, 160], shallow_cost: [1, 3], deep_cost: [2, 4] },
};

export type AsteroidField = Record<AsteroidNameType, AsteroidStateType>;

/**
 * 构造本会话的小行星场：
 * - 配置里给了 asteroids → 原样使用
 * - 否则由 seed 派生：同一 seed 必然得到同一片小行星
 */
export function build_asteroid_field(config: SessionConfigType, seed: number): AsteroidField {
  const rng = mulberry32(mix_seed(seed >>> 0, ASTEROID_SALT));

  const make = (name: AsteroidNameType): AsteroidStateType => {
    const explicit = config.asteroids?.[name];
    const r = GENERATION_RANGES[name];
    const truth = explicit ?? {
      max_minerals: next_int(rng, r.max_minerals[0], r.max_minerals[1]),
      shallow_cost: next_int(rng, r.shallow_cost[0], r.shallow_cost[1]),
      deep_cost: next_int(rng, r.deep_cost[0], r.deep_cost[1]),
    };
    return {
      name,
      travel_cost: config.travel_costs[name],
      max_minerals: truth.max_minerals,
      shallow_cost: truth.shallow_cost,
      deep_cost: truth.deep_cost,
      mined: false,
      mined_round: null,
    };
  };

  // 逐个调用，顺序即抽取顺序
  const Alpha = make('Alpha');
  const Beta = make('Beta');
  const Gamma = make('Gamma');
  const Omega = make('Omega');
  return { Alpha, Beta, Gamma, Omega };
}
