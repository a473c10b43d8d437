import type { ActionType, RoleType } from '../schema';
import type { RoundView } from '../types';
import type { Rng } from '../utils/rng.util';

export interface StrategyContext {
  role: RoleType;
  /** 该席位此刻的视图（只含可见情报） */
  view: RoundView;
  /** 模拟器为每个席位派生的随机源 */
  rng: Rng;
}

export interface Strategy {
  /** 从合法行动中选一个；返回 null 表示本回合保持沉默（截止时记 No-Op） */
  choose(actions: ActionType[], ctx: StrategyContext): ActionType | null;
}
