/**
 * 船员编排器（Session Orchestrator）
 * ---------------------------------
 * - 持有所有船员的 Session；每个船员一只单写者邮箱，命令在船员内部串行、船员之间互不影响。
 * - 入站行动载荷在这里用 zod 解析，之后的校验交给 Session / 回合状态机。
 * - auto_advance 打开时，每个船员在当前阶段截止时刻挂一个计时器，到期即 tick。
 * - 每个命令执行完都会把 Session 产生的事件按类型 emit 出去。
 */
import { EventEmitter } from 'events';
import type { ZodIssue } from 'zod';
import { issue, parse_action, type ActionType, type RoleType } from '../schema';
import type {
  Clock,
  CreateSessionInput,
  Decision,
  EngineError,
  Result,
  RoundView,
  SessionSnapshotType,
} from '../types';
import { logger } from '../utils/logger.util';
import { ConfigurationError, SnapshotError, err } from './errors';
import { Mailbox } from './mailbox';
import { Session, type SessionSummary } from './session';
import { restore_session, snapshot_session } from './snapshot';

export interface OrchestratorOptions {
  /** 默认 Date.now */
  now?: Clock;
  /** 在阶段截止时刻自动推进（默认 false，由调用方 tick） */
  auto_advance?: boolean;
}

interface CrewSlot {
  session: Session;
  mailbox: Mailbox;
  timer: ReturnType<typeof setTimeout> | null;
}

function unknown_crew(crew_id: string): EngineError {
  return err('UnknownCrew', `no session for crew ${crew_id}`, { crew_id });
}

/** zod 的解析问题 → 引擎拒绝原因：种类不认识是越权，参数不认识是目标无效 */
function payload_error(issues: ZodIssue[]): EngineError {
  const unknown_kind = issues.some(
    (i) => i.code === 'invalid_union_discriminator' || (i.code === 'invalid_type' && i.path.length === 0),
  );
  const detail = issues.map((i) => ({ path: '/' + i.path.join('/'), message: i.message }));
  return unknown_kind
    ? err('RoleViolation', 'unknown action kind', { issues: detail })
    : err('InvalidTarget', 'malformed action parameters', { issues: detail });
}

export class CrewOrchestrator extends EventEmitter {
  private readonly crews = new Map<string, CrewSlot>();
  private readonly now: Clock;
  private readonly auto_advance: boolean;
  private closed = false;

  constructor(opts: OrchestratorOptions = {}) {
    super();
    this.now = opts.now ?? (() => Date.now());
    this.auto_advance = opts.auto_advance ?? false;
  }

  get crew_ids(): string[] {
    return [...this.crews.keys()];
  }

  /** 创建会话（状态 waiting）；配置不合法或 crew_id 重复时抛 ConfigurationError */
  create_session(input: CreateSessionInput): void {
    if (this.crews.has(input.crew_id)) {
      throw new ConfigurationError([issue('DUPLICATE_CREW', '/crew_id', `crew ${input.crew_id} already has a session`)]);
    }
    const session = Session.create(input);
    this.crews.set(input.crew_id, { session, mailbox: new Mailbox(), timer: null });
  }

  start(crew_id: string): Promise<Result> {
    return this.command(crew_id, (session): Result => {
      if (!session.start(this.now())) {
        return { ok: false, error: err('StageViolation', `session is already ${session.status}`) };
      }
      return { ok: true };
    });
  }

  submit_action(crew_id: string, round_no: number, role: RoleType, payload: unknown): Promise<Decision> {
    const parsed = parse_action(payload);
    if (!parsed.success) {
      const error = payload_error(parsed.error.issues);
      logger.info('action_malformed', { crew_id, round_no, role, code: error.code });
      const rejected: Decision = { ok: false, error };
      return Promise.resolve(rejected);
    }
    const action: ActionType = parsed.data;
    return this.command(crew_id, (session) => session.submit_action(round_no, role, action, this.now()));
  }

  post_message(crew_id: string, role: RoleType, text: string, to: RoleType | 'crew' = 'crew'): Promise<Decision> {
    return this.command(crew_id, (session) => session.post_message(role, text, to, this.now()));
  }

  /** 读视图不进邮箱：Session 的读操作不改状态 */
  get_round_view(crew_id: string, role: RoleType): Result<{ view: RoundView }> {
    const slot = this.crews.get(crew_id);
    if (!slot) return { ok: false, error: unknown_crew(crew_id) };
    return { ok: true, view: slot.session.view(role) };
  }

  summary(crew_id: string): Result<{ summary: SessionSummary }> {
    const slot = this.crews.get(crew_id);
    if (!slot) return { ok: false, error: unknown_crew(crew_id) };
    return { ok: true, summary: slot.session.summary() };
  }

  /** 推进时钟；不给 crew_id 时推进所有船员 */
  async tick(crew_id?: string): Promise<Result> {
    if (crew_id !== undefined) {
      return this.command(crew_id, (session): Result => {
        session.tick(this.now());
        return { ok: true };
      });
    }
    await Promise.all(this.crew_ids.map((id) => this.tick(id)));
    return { ok: true };
  }

  /**
   * 终止船员会话：等正在执行的命令跑完，丢弃进行中的回合，撤掉计时器。
   * 之后排队的命令都会因会话已 aborted 被拒绝。
   */
  abort_round(crew_id: string, reason: string): Promise<Result> {
    return this.command(crew_id, (session): Result => {
      if (!session.abort(reason)) {
        return { ok: false, error: err('StageViolation', `session is already ${session.status}`) };
      }
      return { ok: true };
    });
  }

  snapshot(crew_id: string): Promise<Result<{ snapshot: SessionSnapshotType }>> {
    return this.command(crew_id, (session): Result<{ snapshot: SessionSnapshotType }> => ({
      ok: true,
      snapshot: snapshot_session(session),
    }));
  }

  /** 从快照恢复一个船员；快照不合法或 crew_id 已存在时抛 SnapshotError */
  restore(snapshot: unknown): string {
    const session = restore_session(snapshot);
    if (this.crews.has(session.crew_id)) {
      throw new SnapshotError(`crew ${session.crew_id} already has a live session`);
    }
    const slot: CrewSlot = { session, mailbox: new Mailbox(), timer: null };
    this.crews.set(session.crew_id, slot);
    logger.info('session_restored', { crew_id: session.crew_id, status: session.status, round: session.round_number });
    // 停机期间可能已错过截止时间
    session.tick(this.now());
    this.flush(slot);
    return session.crew_id;
  }

  /** 撤掉所有计时器，等所有邮箱排空 */
  async shutdown(): Promise<void> {
    this.closed = true;
    for (const slot of this.crews.values()) this.disarm(slot);
    await Promise.all([...this.crews.values()].map((slot) => slot.mailbox.idle()));
    logger.info('orchestrator_shutdown', { crews: this.crews.size });
  }

  private command<R>(crew_id: string, run: (session: Session) => R): Promise<R | { ok: false; error: EngineError }> {
    const slot = this.crews.get(crew_id);
    if (!slot) {
      const rejected: { ok: false; error: EngineError } = { ok: false, error: unknown_crew(crew_id) };
      return Promise.resolve(rejected);
    }
    return slot.mailbox.enqueue(() => {
      try {
        return run(slot.session);
      } finally {
        this.flush(slot);
      }
    });
  }

  /**
   * 按最新截止时间重挂计时器，再广播积压事件。
   * 监听器抛错只记日志：会话状态已经变更，命令结果与后续事件都不受影响。
   */
  private flush(slot: CrewSlot): void {
    this.arm(slot);
    for (const event of slot.session.drain_events()) {
      try {
        this.emit(event.type, event);
      } catch (e) {
        logger.error('listener_failed', {
          crew_id: slot.session.crew_id,
          event: event.type,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
  }

  private arm(slot: CrewSlot): void {
    this.disarm(slot);
    const { session } = slot;
    const deadline = session.deadline;
    if (!this.auto_advance || this.closed || session.status !== 'running' || deadline === null) return;
    const delay = Math.max(0, deadline - this.now());
    slot.timer = setTimeout(() => {
      slot.timer = null;
      this.tick(session.crew_id).catch((e: unknown) => {
        logger.error('auto_advance_failed', { crew_id: session.crew_id, error: e instanceof Error ? e.message : String(e) });
      });
    }, delay);
  }

  private disarm(slot: CrewSlot): void {
    if (slot.timer) {
      clearTimeout(slot.timer);
      slot.timer = null;
    }
  }
}
