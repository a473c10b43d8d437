/**
 * 测试共用的会话配置：小行星真值固定，便于断言产量与情报。
 */
export const FIXED_FIELD = {
  Alpha: { max_minerals: 80, shallow_cost: 1, deep_cost: 2 },
  Beta: { max_minerals: 100, shallow_cost: 2, deep_cost: 3 },
  Gamma: { max_minerals: 120, shallow_cost: 1, deep_cost: 4 },
  Omega: { max_minerals: 150, shallow_cost: 3, deep_cost: 4 },
};

/** 所有组合成功率都是 p 的矩阵 */
export function flat_matrix(p: number) {
  const row = { none: p, probe_only: p, robot_only: p, probe_plus_robot: p };
  return { shallow: row, deep: row };
}

export function make_config(over: Record<string, unknown> = {}) {
  return { pressure: 'high', complexity: 'high', asteroids: FIXED_FIELD, ...over };
}
