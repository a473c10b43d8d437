import type { Strategy } from '../strategy';

/** 均匀随机；随机源来自上下文，同一种子可复现 */
export const random_strategy: Strategy = {
  choose(actions, { rng }) {
    if (actions.length === 0) return null;
    return actions[rng.next_uint32() % actions.length] ?? null;
  },
};
