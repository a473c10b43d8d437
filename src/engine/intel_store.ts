import type {
  AsteroidNameType,
  ComplexityType,
  IntelKindType,
  IntelStateType,
  RoleType,
} from '../schema';
import type { IntelFactType } from '../types';
import { intel_state_of } from './resolver';

/**
 * 情报库 + 可见性策略。
 *
 * 情报只追加、不覆盖；可见性不落库，每次按下列规则计算：
 *  - complexity = low：发现即全员可见
 *  - 发现者本人：始终可见
 *  - complexity = high：发现回合之后（round < current_round）对全员可见，
 *    即发现回合内保持私有，下一回合起相当于“汇报后公开”。
 */
export class IntelStore {
  private readonly facts: IntelFactType[];

  constructor(readonly complexity: ComplexityType, facts: IntelFactType[] = []) {
    this.facts = facts.map((f) => ({ ...f }));
  }

  /**
   * 追加一条情报。同一 (asteroid, kind, value, discoverer) 重复发现是幂等的，
   * 保留最早的发现回合。返回是否真的新增。
   */
  record(fact: IntelFactType): boolean {
    const dup = this.facts.some(
      (f) =>
        f.asteroid === fact.asteroid &&
        f.kind === fact.kind &&
        f.value === fact.value &&
        f.discoverer === fact.discoverer,
    );
    if (dup) return false;
    this.facts.push({ ...fact });
    return true;
  }

  visible_to(role: RoleType, fact: IntelFactType, current_round: number): boolean {
    if (this.complexity === 'low') return true;
    if (fact.discoverer === role) return true;
    return fact.round < current_round;
  }

  visible_facts(role: RoleType, current_round: number): IntelFactType[] {
    return this.facts.filter((f) => this.visible_to(role, f, current_round)).map((f) => ({ ...f }));
  }

  /** role 此刻能看到的某条情报的值；看不到返回 null */
  known_value(role: RoleType, asteroid: AsteroidNameType, kind: IntelKindType, current_round: number): number | null {
    const hit = this.facts.find(
      (f) => f.asteroid === asteroid && f.kind === kind && this.visible_to(role, f, current_round),
    );
    return hit ? hit.value : null;
  }

  /**
   * 按 role 的可见情报推导 intel_state：
   * 探针 → max_minerals；机器人 → shallow_cost / deep_cost（任一可见即算）。
   */
  intel_state_for(role: RoleType, asteroid: AsteroidNameType, current_round: number): IntelStateType {
    const probe = this.known_value(role, asteroid, 'max_minerals', current_round) !== null;
    const robot =
      this.known_value(role, asteroid, 'shallow_cost', current_round) !== null ||
      this.known_value(role, asteroid, 'deep_cost', current_round) !== null;
    return intel_state_of(probe, robot);
  }

  all(): IntelFactType[] {
    return this.facts.map((f) => ({ ...f }));
  }

  get size(): number {
    return this.facts.length;
  }
}
