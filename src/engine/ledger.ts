import type { z } from 'zod';
import type { ActingRoleType, LedgerState } from '../schema';
import type { EngineError } from '../types';
import { err } from './errors';

type LedgerStateType = z.infer<typeof LedgerState>;

type ReserveResult = { ok: true; remaining: number } | { ok: false; error: EngineError };

/**
 * 回合级 PU 账本。
 *
 * - remaining：本回合剩余 PU，回合开始时等于 budget，只减不增。
 * - holds：行动阶段里已受理但尚未结算的行动所占的额度；结算时转成真实扣款。
 *   同一席位重新提交（后写覆盖）会替换它自己的 hold，而不是退款。
 * - spent：按席位累计的真实扣款，供统计使用。
 */
export class ResourceLedger {
  private remaining_pu: number;
  private readonly holds: Record<ActingRoleType, number>;
  private readonly spent: Record<ActingRoleType, number>;

  constructor(readonly budget: number, state?: Omit<LedgerStateType, 'budget'>) {
    this.remaining_pu = state?.remaining ?? budget;
    this.holds = { navigator: 0, driller: 0, ...state?.holds };
    this.spent = { navigator: 0, driller: 0, ...state?.spent };
  }

  get remaining(): number {
    return this.remaining_pu;
  }

  /** 扣除其他席位 hold 之后，role 还能用的额度 */
  available_for(role: ActingRoleType): number {
    const others = role === 'navigator' ? this.holds.driller : this.holds.navigator;
    return this.remaining_pu - others;
  }

  /** 为 role 的待结算行动占额度（替换该席位之前的 hold） */
  hold(role: ActingRoleType, cost: number): ReserveResult {
    const available = this.available_for(role);
    if (cost > available) {
      return {
        ok: false,
        error: err('InsufficientPU', `need ${cost} PU, ${available} available`, { cost, available, remaining: this.remaining_pu }),
      };
    }
    this.holds[role] = cost;
    return { ok: true, remaining: this.remaining_pu };
  }

  release(role: ActingRoleType): void {
    this.holds[role] = 0;
  }

  release_all(): void {
    this.holds.navigator = 0;
    this.holds.driller = 0;
  }

  /**
   * 原子地“检查并扣款”。没有退款路径：扣了就是花了，不论采矿成败。
   */
  reserve(role: ActingRoleType, cost: number): ReserveResult {
    if (!Number.isInteger(cost) || cost < 0) {
      return { ok: false, error: err('InsufficientPU', `invalid cost ${cost}`) };
    }
    if (cost > this.remaining_pu) {
      return {
        ok: false,
        error: err('InsufficientPU', `need ${cost} PU, ${this.remaining_pu} remaining`, { cost, remaining: this.remaining_pu }),
      };
    }
    this.remaining_pu -= cost;
    this.spent[role] += cost;
    return { ok: true, remaining: this.remaining_pu };
  }

  spent_by(role: ActingRoleType): number {
    return this.spent[role];
  }

  to_json(): LedgerStateType {
    return {
      budget: this.budget,
      remaining: this.remaining_pu,
      holds: { ...this.holds },
      spent: { ...this.spent },
    };
  }

  static from_json(state: LedgerStateType): ResourceLedger {
    return new ResourceLedger(state.budget, state);
  }
}
