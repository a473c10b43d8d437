import type { ActionType } from '../../schema';
import type { Strategy } from '../strategy';

type ActionOf<K extends ActionType['kind']> = Extract<ActionType, { kind: K }>;

function is_kind<K extends ActionType['kind']>(kind: K) {
  return (a: ActionType): a is ActionOf<K> => a.kind === kind;
}

/**
 * 先侦察再开采：
 * - 领航员：当前位置已开采 → 飞往最便宜的未开采小行星；未探测 → 发探针
 * - 司钻：当前位置已开采 → 待命；没有成本情报 → 放机器人；否则优先深层开采，付不起就浅层
 */
export const greedy_intel_strategy: Strategy = {
  choose(actions, { role, view }) {
    const here = view.asteroids.find((a) => a.current_location);
    const state = view.intel_state_here;

    if (role === 'navigator') {
      if (here?.mined) {
        const targets = actions
          .filter(is_kind('travel'))
          .map((a) => ({ action: a, info: view.asteroids.find((x) => x.name === a.destination) }))
          .filter((c) => c.info && !c.info.mined)
          .sort((x, y) => (x.info?.travel_cost ?? 0) - (y.info?.travel_cost ?? 0));
        if (targets[0]) return targets[0].action;
      }
      if (state === 'none' || state === 'robot_only') {
        const probe = actions.find(is_kind('send_probe'));
        if (probe) return probe;
      }
      return actions.find(is_kind('no_op')) ?? null;
    }

    if (role === 'driller') {
      if (here?.mined) return actions.find(is_kind('no_op')) ?? null;
      if (state === 'none' || state === 'probe_only') {
        const robot = actions.find(is_kind('deploy_robot'));
        if (robot) return robot;
      }
      const mines = actions.filter(is_kind('mine'));
      const mine = mines.find((a) => a.depth === 'deep') ?? mines.find((a) => a.depth === 'shallow');
      if (mine) return mine;
      return actions.find(is_kind('no_op')) ?? null;
    }

    return null;
  },
};
