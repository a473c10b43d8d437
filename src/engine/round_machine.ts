/**
 * 回合状态机（Round State Machine）
 * --------------------------------
 * briefing → action → result → （下一回合 briefing | 会话结束）
 *
 * - 进入每个阶段时写入绝对截止时间（epoch ms）；tick(now) 负责到期迁移，
 *   时钟跳跃时可以一次连跨多个阶段，后一阶段以前一阶段的截止时间为起点。
 * - action 阶段：领航员与司钻都已提交即提前进入 result；否则等到截止。
 * - 进入 result 时先把沉默的席位补成 No-Op，再按固定因果顺序结算：
 *   航行 → 探针 → 机器人 → 采矿（不是提交顺序）。
 * - 所有变更都只经由本类完成；调用方（Session）保证单写者。
 */
import type {
  ActingRoleType,
  ActionType,
  AsteroidNameType,
  RoleType,
  SessionConfigType,
  StageType,
} from '../schema';
import type {
  ChatMessageType,
  CrewAnalyticsType,
  Decision,
  IntelFactType,
  MiningOutcomeType,
  PendingActionType,
  RoundOutcomeType,
  SkippedEffectType,
} from '../types';
import type { z } from 'zod';
import type { RoundState } from '../schema';
import { RingBuffer } from '../utils/ring_buffer.util';
import { logger } from '../utils/logger.util';
import type { AsteroidField } from './asteroids';
import { check_message } from './comms';
import type { IntelStore } from './intel_store';
import { ResourceLedger } from './ledger';
import { resolve_mining } from './resolver';
import { validate_action } from './validate_action';

type RoundStateType = z.infer<typeof RoundState>;

/**
 * 回合需要读写的船员状态。由 Session 持有，按引用交给回合；
 * 结算会改动 location / asteroids / intel / rng_state / analytics。
 */
export interface CrewState {
  crew_id: string;
  config: SessionConfigType;
  location: AsteroidNameType;
  asteroids: AsteroidField;
  intel: IntelStore;
  rng_state: number;
  analytics: CrewAnalyticsType;
}

export interface StageEntry {
  stage: StageType;
  deadline: number;
  cause: 'start' | 'deadline' | 'early';
}

/** 一次 submit / tick 推进的结果 */
export interface RoundStep {
  entered: StageEntry[];
  /** 本次推进中完成的结算（每回合至多一次） */
  resolved: RoundOutcomeType | null;
  /** result 阶段到期的时刻；回合仍在进行时为 null */
  finished_at: number | null;
}

function no_op(role: ActingRoleType, at: number): PendingActionType {
  return { role, action: { kind: 'no_op' }, cost: 0, submitted_at: at, auto: true };
}

export class RoundStateMachine {
  readonly number: number;
  private stage_: StageType;
  private stage_started_at: number;
  private deadline_: number;
  private readonly pending: Record<ActingRoleType, PendingActionType | null>;
  private readonly ledger: ResourceLedger;
  private readonly messages: RingBuffer<ChatMessageType>;
  private outcome_: RoundOutcomeType | null;

  private constructor(private readonly crew: CrewState, state: RoundStateType) {
    this.number = state.number;
    this.stage_ = state.stage;
    this.stage_started_at = state.stage_started_at;
    this.deadline_ = state.deadline;
    this.pending = { navigator: state.pending.navigator, driller: state.pending.driller };
    this.ledger = ResourceLedger.from_json(state.ledger);
    this.messages = new RingBuffer<ChatMessageType>(crew.config.message_log_capacity);
    for (const m of state.messages) this.messages.push(m);
    this.outcome_ = state.outcome;
  }

  /** 开新回合：PU 重置，进入 briefing */
  static begin(crew: CrewState, number: number, now: number): { round: RoundStateMachine; entry: StageEntry } {
    const deadline = now + RoundStateMachine.duration_of(crew.config, 'briefing');
    const round = new RoundStateMachine(crew, {
      number,
      stage: 'briefing',
      stage_started_at: now,
      deadline,
      pending: { navigator: null, driller: null },
      ledger: new ResourceLedger(crew.config.pu_per_round).to_json(),
      messages: [],
      outcome: null,
    });
    return { round, entry: { stage: 'briefing', deadline, cause: 'start' } };
  }

  static from_json(crew: CrewState, state: RoundStateType): RoundStateMachine {
    return new RoundStateMachine(crew, state);
  }

  /** 阶段时长；briefing 由 pressure 决定 */
  static duration_of(config: SessionConfigType, stage: StageType): number {
    const d = config.stage_durations_ms;
    switch (stage) {
      case 'briefing':
        return config.pressure === 'high' ? d.briefing_high : d.briefing_low;
      case 'action':
        return d.action;
      case 'result':
        return d.result;
    }
  }

  get stage(): StageType {
    return this.stage_;
  }

  get deadline(): number {
    return this.deadline_;
  }

  get remaining_pu(): number {
    return this.ledger.remaining;
  }

  get outcome(): RoundOutcomeType | null {
    return this.outcome_;
  }

  get scored(): boolean {
    return this.number >= 1;
  }

  pending_for(role: RoleType): ActionType | null {
    if (role === 'captain') return null;
    return this.pending[role]?.action ?? null;
  }

  messages_for(role: RoleType): ChatMessageType[] {
    return this.messages.to_array().filter((m) => m.to === 'crew' || m.to === role || m.from === role);
  }

  /** 只校验、不受理；legal_actions 与 submit 共用 */
  check(role: RoleType, action: ActionType): Decision {
    return validate_action(role, action, {
      config: this.crew.config,
      stage: this.stage_,
      pending: this.pending,
      location: this.crew.location,
      asteroids: this.crew.asteroids,
      ledger: this.ledger,
      probes_used: this.crew.analytics.probes_used,
      robots_used: this.crew.analytics.robots_used,
    });
  }

  /**
   * 受理一次提交。同一席位在 action 阶段内再次提交会替换之前的待结算行动（后写覆盖），
   * 领航员与司钻都到齐后立即进入 result。
   */
  submit(role: RoleType, action: ActionType, now: number): { decision: Decision; step: RoundStep } {
    const idle: RoundStep = { entered: [], resolved: null, finished_at: null };
    const decision = this.check(role, action);
    if (!decision.ok || role === 'captain') return { decision, step: idle };

    const held = this.ledger.hold(role, decision.cost);
    if (!held.ok) return { decision: { ok: false, error: held.error }, step: idle };

    this.pending[role] = { role, action, cost: decision.cost, submitted_at: now, auto: false };

    if (this.pending.navigator && this.pending.driller) {
      const step = this.enter('result', now, 'early');
      return { decision, step };
    }
    return { decision, step: idle };
  }

  post_message(from: RoleType, to: RoleType | 'crew', text: string, now: number): { ok: true; message: ChatMessageType } | { ok: false; decision: Decision } {
    const error = check_message(from, to, text, this.stage_, this.crew.config.message_max_length);
    if (error) return { ok: false, decision: { ok: false, error } };
    const message: ChatMessageType = { round: this.number, from, to, text: text.trim(), at: now };
    const { dropped } = this.messages.push(message);
    if (dropped) logger.debug('message_log_evicted', { crew_id: this.crew.crew_id, round: this.number, at: dropped.at });
    return { ok: true, message };
  }

  /** 按时钟推进；截止时间 <= now 的阶段依次迁移 */
  tick(now: number): RoundStep {
    const step: RoundStep = { entered: [], resolved: null, finished_at: null };
    while (now >= this.deadline_) {
      const at = this.deadline_;
      if (this.stage_ === 'briefing') {
        this.merge(step, this.enter('action', at, 'deadline'));
      } else if (this.stage_ === 'action') {
        this.merge(step, this.enter('result', at, 'deadline'));
      } else {
        step.finished_at = at;
        break;
      }
    }
    return step;
  }

  private merge(into: RoundStep, from: RoundStep): void {
    into.entered.push(...from.entered);
    if (from.resolved) into.resolved = from.resolved;
  }

  private enter(stage: StageType, at: number, cause: StageEntry['cause']): RoundStep {
    this.stage_ = stage;
    this.stage_started_at = at;
    this.deadline_ = at + RoundStateMachine.duration_of(this.crew.config, stage);
    const step: RoundStep = { entered: [{ stage, deadline: this.deadline_, cause }], resolved: null, finished_at: null };
    if (stage === 'result') {
      step.resolved = this.resolve(at);
    }
    return step;
  }

  /** 按因果顺序结算本回合；只会被调用一次 */
  private resolve(at: number): RoundOutcomeType {
    const crew = this.crew;
    const nav = this.pending.navigator ?? no_op('navigator', at);
    const drl = this.pending.driller ?? no_op('driller', at);
    this.pending.navigator = nav;
    this.pending.driller = drl;
    // 占额度全部转为真实扣款或作废
    this.ledger.release_all();

    const location_before = crew.location;
    const skipped: SkippedEffectType[] = [];
    const intel_recorded: IntelFactType[] = [];
    let mining: MiningOutcomeType | null = null;

    const skip = (p: PendingActionType, reason: string, message: string) => {
      skipped.push({ role: p.role, kind: p.action.kind, reason, message });
      logger.warn('effect_skipped', { crew_id: crew.crew_id, round: this.number, role: p.role, kind: p.action.kind, reason });
    };
    const record = (fact: IntelFactType) => {
      if (crew.intel.record(fact)) intel_recorded.push(fact);
    };
    const debit = (p: PendingActionType): boolean => {
      const r = this.ledger.reserve(p.role, p.cost);
      if (!r.ok) skip(p, r.error.code, r.error.message);
      return r.ok;
    };

    // (1) 航行：先移动船员，后续效果都作用于新位置
    if (nav.action.kind === 'travel' && debit(nav)) {
      crew.location = nav.action.destination;
    }

    // (2) 探针：揭示当前位置的 max_minerals
    if (nav.action.kind === 'send_probe' && debit(nav)) {
      const here = crew.asteroids[crew.location];
      record({ asteroid: here.name, kind: 'max_minerals', value: here.max_minerals, discoverer: 'navigator', round: this.number });
      crew.analytics.probes_used += 1;
    }

    // (3) 机器人：揭示当前位置的两种开采成本
    if (drl.action.kind === 'deploy_robot' && debit(drl)) {
      const here = crew.asteroids[crew.location];
      record({ asteroid: here.name, kind: 'shallow_cost', value: here.shallow_cost, discoverer: 'driller', round: this.number });
      record({ asteroid: here.name, kind: 'deep_cost', value: here.deep_cost, discoverer: 'driller', round: this.number });
      crew.analytics.robots_used += 1;
    }

    // (4) 采矿：情报组合按司钻此刻可见的情报计算
    if (drl.action.kind === 'mine') {
      const here = crew.asteroids[crew.location];
      const target = drl.action.target;
      if (target && target !== here.name) {
        skip(drl, 'InvalidTarget', `crew moved to ${here.name}, mine target was ${target}`);
      } else if (here.mined) {
        skip(drl, 'InvalidTarget', `${here.name} has already been mined`);
      } else if (debit(drl)) {
        const intel_state = crew.intel.intel_state_for('driller', here.name, this.number);
        const r = resolve_mining({
          round: this.number,
          asteroid: here,
          depth: drl.action.depth,
          intel_state,
          matrix: crew.config.probability_matrix,
          rng_state: crew.rng_state,
          cost_paid: drl.cost,
          unprobed_success_yield: crew.config.unprobed_success_yield,
        });
        crew.rng_state = r.rng_state;
        here.mined = true;
        here.mined_round = this.number;
        mining = r.outcome;
      }
    }

    const pu_spent = { navigator: this.ledger.spent_by('navigator'), driller: this.ledger.spent_by('driller') };
    const gained = mining?.minerals_gained ?? 0;
    if (this.scored) crew.analytics.cumulative_minerals += gained;
    else crew.analytics.training_minerals += gained;
    crew.analytics.cumulative_pu.navigator += pu_spent.navigator;
    crew.analytics.cumulative_pu.driller += pu_spent.driller;
    crew.analytics.cumulative_pu_team += pu_spent.navigator + pu_spent.driller;

    const outcome: RoundOutcomeType = {
      round: this.number,
      scored: this.scored,
      location_before,
      location_after: crew.location,
      committed: { navigator: nav, driller: drl },
      pu_spent,
      remaining_pu: this.ledger.remaining,
      intel_recorded,
      mining,
      skipped,
    };
    this.outcome_ = outcome;

    logger.info('round_resolved', {
      crew_id: crew.crew_id,
      round: this.number,
      location: crew.location,
      remaining_pu: outcome.remaining_pu,
      mining: mining ? { asteroid: mining.asteroid, depth: mining.depth, success: mining.success, minerals: mining.minerals_gained } : null,
    });
    return outcome;
  }

  to_json(): RoundStateType {
    return {
      number: this.number,
      stage: this.stage_,
      stage_started_at: this.stage_started_at,
      deadline: this.deadline_,
      pending: { navigator: this.pending.navigator, driller: this.pending.driller },
      ledger: this.ledger.to_json(),
      messages: this.messages.to_array(),
      outcome: this.outcome_,
    };
  }
}
