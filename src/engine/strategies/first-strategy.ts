import type { Strategy } from '../strategy';

export const first_strategy: Strategy = {
  choose(actions) {
    return actions[0] ?? null;
  },
};
