import type { ActionType, RoleType } from '../schema';
import type {
  AsteroidPublicInfo,
  CreateSessionInput,
  CrewAnalyticsType,
  Decision,
  RoundOutcomeType,
  RoundView,
  SessionEvent,
  SessionStateType,
  SessionStatusType,
} from '../types';
import { build_session_config } from '../config/session';
import { logger } from '../utils/logger.util';
import { ASTEROID_NAMES } from '../schema';
import { build_asteroid_field } from './asteroids';
import { err } from './errors';
import { IntelStore } from './intel_store';
import { RoundStateMachine, type CrewState, type RoundStep, type StageEntry } from './round_machine';
import { is_acting_role } from './validate_action';

export interface SessionSummary {
  crew_id: string;
  status: SessionStatusType;
  seed: number;
  rounds: RoundOutcomeType[];
  analytics: CrewAnalyticsType;
  abort_reason: string | null;
}

function empty_analytics(): CrewAnalyticsType {
  return {
    cumulative_minerals: 0,
    training_minerals: 0,
    cumulative_pu_team: 0,
    cumulative_pu: { captain: 0, navigator: 0, driller: 0 },
    probes_used: 0,
    robots_used: 0,
  };
}

/**
 * 单个船员的会话聚合。
 *
 * 持有船员的组合状态（位置、小行星、情报、RNG、累计统计）与当前回合；
 * 回合序列为第 0 回合（训练）+ 1..scored_rounds（计分）。
 * 本类是同步的，不做 IO、不设计时器：时间一律由调用方以 now 传入，
 * 产生的事件先进 outbox，由编排器 drain 后广播。
 */
export class Session {
  private status_: SessionStatusType;
  private round: RoundStateMachine | null;
  private readonly history: RoundOutcomeType[];
  private abort_reason: string | null;
  private aborted_in_round: number | null;
  private outbox: SessionEvent[] = [];

  private constructor(
    private readonly crew: CrewState,
    readonly seed: number,
    state: Pick<SessionStateType, 'status' | 'history' | 'abort_reason' | 'aborted_in_round' | 'round'>,
  ) {
    this.status_ = state.status;
    this.history = [...state.history];
    this.abort_reason = state.abort_reason;
    this.aborted_in_round = state.aborted_in_round;
    this.round = state.round ? RoundStateMachine.from_json(crew, state.round) : null;
  }

  /** 校验配置、生成小行星场；配置不合法时抛 ConfigurationError */
  static create(input: CreateSessionInput): Session {
    const { config } = build_session_config(input.config);
    const seed = input.seed >>> 0;
    const crew: CrewState = {
      crew_id: input.crew_id,
      config,
      location: config.starting_location,
      asteroids: build_asteroid_field(config, seed),
      intel: new IntelStore(config.complexity),
      rng_state: seed,
      analytics: empty_analytics(),
    };
    logger.info('session_created', {
      crew_id: input.crew_id,
      seed,
      pressure: config.pressure,
      complexity: config.complexity,
      captain_type: config.captain_type,
      scored_rounds: config.scored_rounds,
    });
    return new Session(crew, seed, { status: 'waiting', history: [], abort_reason: null, aborted_in_round: null, round: null });
  }

  /** 从快照状态恢复（结构已由调用方校验） */
  static from_state(state: SessionStateType): Session {
    const crew: CrewState = {
      crew_id: state.crew_id,
      config: state.config,
      location: state.location,
      asteroids: {
        Alpha: { ...state.asteroids.Alpha },
        Beta: { ...state.asteroids.Beta },
        Gamma: { ...state.asteroids.Gamma },
        Omega: { ...state.asteroids.Omega },
      },
      intel: new IntelStore(state.config.complexity, state.intel),
      rng_state: state.rng_state,
      analytics: {
        ...state.analytics,
        cumulative_pu: { ...state.analytics.cumulative_pu },
      },
    };
    return new Session(crew, state.seed, state);
  }

  get crew_id(): string {
    return this.crew.crew_id;
  }

  get status(): SessionStatusType {
    return this.status_;
  }

  get config() {
    return this.crew.config;
  }

  get round_number(): number | null {
    return this.round?.number ?? null;
  }

  get stage() {
    return this.round?.stage ?? null;
  }

  /** 当前阶段的绝对截止时间；无进行中的回合时为 null */
  get deadline(): number | null {
    return this.round?.deadline ?? null;
  }

  get location() {
    return this.crew.location;
  }

  get analytics(): CrewAnalyticsType {
    return { ...this.crew.analytics, cumulative_pu: { ...this.crew.analytics.cumulative_pu } };
  }

  /** 取走待广播的事件 */
  drain_events(): SessionEvent[] {
    const out = this.outbox;
    this.outbox = [];
    return out;
  }

  /** 进入第 0 回合的简报 */
  start(now: number): boolean {
    if (this.status_ !== 'waiting') return false;
    this.status_ = 'running';
    this.begin_round(0, now);
    logger.info('session_started', { crew_id: this.crew_id, at: now });
    return true;
  }

  /** 时钟推进：处理所有到期的阶段，必要时连跨多个回合 */
  tick(now: number): void {
    while (this.status_ === 'running' && this.round) {
      const step = this.round.tick(now);
      this.absorb(step);
      if (step.finished_at === null) return;
      this.finish_round(step.finished_at);
    }
  }

  /** 只做校验，不改变任何状态 */
  check_action(role: RoleType, action: ActionType): Decision {
    if (this.status_ !== 'running' || !this.round) {
      return { ok: false, error: err('StageViolation', `session is ${this.status_}`) };
    }
    return this.round.check(role, action);
  }

  /**
   * 受理一次行动提交。先按 now 追平时钟，保证截止之后到达的提交看到的是已定稿的回合。
   */
  submit_action(round_no: number, role: RoleType, action: ActionType, now: number): Decision {
    this.tick(now);
    if (this.status_ !== 'running' || !this.round) {
      return { ok: false, error: err('StageViolation', `session is ${this.status_}`, { status: this.status_ }) };
    }
    const current = this.round.number;
    if (round_no !== current) {
      if (round_no < current && is_acting_role(role)) {
        return { ok: false, error: err('DuplicateAction', `round ${round_no} is already final`, { round_no, current }) };
      }
      return { ok: false, error: err('StageViolation', `round ${round_no} is not the active round`, { round_no, current }) };
    }

    const { decision, step } = this.round.submit(role, action, now);
    if (!decision.ok) {
      logger.info('action_rejected', { crew_id: this.crew_id, round: current, role, kind: action.kind, code: decision.error.code });
      return decision;
    }
    logger.info('action_accepted', { crew_id: this.crew_id, round: current, role, kind: action.kind, replaced: decision.replaced });
    this.outbox.push({ type: 'action_accepted', crew_id: this.crew_id, round: current, role, action, replaced: decision.replaced });
    this.absorb(step);
    return decision;
  }

  /** 简报阶段留言（人类与 AI 船长同等对待） */
  post_message(role: RoleType, text: string, to: RoleType | 'crew', now: number): Decision {
    this.tick(now);
    if (this.status_ !== 'running' || !this.round) {
      return { ok: false, error: err('StageViolation', `session is ${this.status_}`) };
    }
    const r = this.round.post_message(role, to, text, now);
    if (!r.ok) return r.decision;
    this.outbox.push({ type: 'message_posted', crew_id: this.crew_id, message: r.message });
    return { ok: true, cost: 0, replaced: false };
  }

  /**
   * 终止会话：丢弃进行中的回合（已结算的回合保留），状态变为 aborted。
   * 终态；重复调用无效果。
   */
  abort(reason: string): boolean {
    if (this.status_ === 'complete' || this.status_ === 'aborted') return false;
    const round = this.round?.number ?? null;
    this.round = null;
    this.status_ = 'aborted';
    this.abort_reason = reason;
    this.aborted_in_round = round;
    this.outbox.push({ type: 'session_aborted', crew_id: this.crew_id, round, reason });
    logger.warn('session_aborted', { crew_id: this.crew_id, round, reason });
    return true;
  }

  view(role: RoleType): RoundView {
    const round = this.round;
    // 没有进行中的回合：终止时按终止所在回合计算可见性，正常结束后全部按已过回合处理
    const visibility_round = round?.number ?? this.aborted_in_round ?? this.history.length;
    const asteroids: AsteroidPublicInfo[] = ASTEROID_NAMES.map((name) => ({
      name,
      travel_cost: this.crew.asteroids[name].travel_cost,
      mined: this.crew.asteroids[name].mined,
      current_location: name === this.crew.location,
    }));
    return {
      crew_id: this.crew_id,
      role,
      status: this.status_,
      round: round?.number ?? null,
      scored: round?.scored ?? false,
      rounds_total: this.crew.config.scored_rounds + 1,
      stage: round?.stage ?? null,
      deadline: round?.deadline ?? null,
      remaining_pu: round?.remaining_pu ?? 0,
      pu_per_round: this.crew.config.pu_per_round,
      location: this.crew.location,
      asteroids,
      intel: this.crew.intel.visible_facts(role, visibility_round),
      pending_action: round?.pending_for(role) ?? null,
      intel_state_here: this.crew.intel.intel_state_for(role, this.crew.location, visibility_round),
      cumulative_minerals: this.crew.analytics.cumulative_minerals,
      messages: round?.messages_for(role) ?? [],
      last_outcome: this.history[this.history.length - 1] ?? null,
    };
  }

  summary(): SessionSummary {
    return {
      crew_id: this.crew_id,
      status: this.status_,
      seed: this.seed,
      rounds: [...this.history],
      analytics: this.analytics,
      abort_reason: this.abort_reason,
    };
  }

  to_state(): SessionStateType {
    const c = this.crew;
    return {
      crew_id: c.crew_id,
      seed: this.seed,
      config: c.config,
      status: this.status_,
      location: c.location,
      asteroids: {
        Alpha: { ...c.asteroids.Alpha },
        Beta: { ...c.asteroids.Beta },
        Gamma: { ...c.asteroids.Gamma },
        Omega: { ...c.asteroids.Omega },
      },
      intel: c.intel.all(),
      rng_state: c.rng_state,
      analytics: this.analytics,
      round: this.round?.to_json() ?? null,
      history: [...this.history],
      abort_reason: this.abort_reason,
      aborted_in_round: this.aborted_in_round,
    };
  }

  private begin_round(number: number, at: number): void {
    const { round, entry } = RoundStateMachine.begin(this.crew, number, at);
    this.round = round;
    this.push_stage(number, entry);
  }

  private push_stage(round: number, entry: StageEntry): void {
    this.outbox.push({ type: 'stage_changed', crew_id: this.crew_id, round, stage: entry.stage, deadline: entry.deadline, cause: entry.cause });
    logger.debug('stage_changed', { crew_id: this.crew_id, round, stage: entry.stage, deadline: entry.deadline, cause: entry.cause });
  }

  /** 把回合推进结果翻译成事件 */
  private absorb(step: RoundStep): void {
    const round = this.round;
    if (!round) return;
    for (const entry of step.entered) this.push_stage(round.number, entry);
    if (step.resolved) {
      const outcome = step.resolved;
      this.history.push(outcome);
      const last = round.number >= this.crew.config.scored_rounds;
      this.outbox.push({
        type: 'round_resolved',
        crew_id: this.crew_id,
        outcome,
        mining: outcome.mining,
        analytics: this.analytics,
        next: last ? { round: null, stage: 'complete' } : { round: round.number + 1, stage: 'briefing' },
        result_deadline: round.deadline,
      });
    }
  }

  /** result 阶段到期：开下一回合或结束会话 */
  private finish_round(at: number): void {
    const round = this.round;
    if (!round) return;
    const next = round.number + 1;
    if (next > this.crew.config.scored_rounds) {
      this.round = null;
      this.status_ = 'complete';
      this.outbox.push({ type: 'session_complete', crew_id: this.crew_id, analytics: this.analytics });
      logger.info('session_complete', {
        crew_id: this.crew_id,
        cumulative_minerals: this.crew.analytics.cumulative_minerals,
        cumulative_pu_team: this.crew.analytics.cumulative_pu_team,
      });
      return;
    }
    this.begin_round(next, at);
  }
}
