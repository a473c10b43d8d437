import type { z } from 'zod';
import type {
  AsteroidNameType,
  IntelStateType,
  RoleType,
  StageType,
  AsteroidState,
  ChatMessage,
  CrewAnalytics,
  IntelFact,
  MiningOutcome,
  PendingAction,
  RoundOutcome,
  SessionSnapshot,
  SessionState,
  SessionStatus,
  SkippedEffect,
  ActionType,
} from '../schema';

export type AsteroidStateType = z.infer<typeof AsteroidState>;
export type IntelFactType = z.infer<typeof IntelFact>;
export type PendingActionType = z.infer<typeof PendingAction>;
export type MiningOutcomeType = z.infer<typeof MiningOutcome>;
export type SkippedEffectType = z.infer<typeof SkippedEffect>;
export type RoundOutcomeType = z.infer<typeof RoundOutcome>;
export type ChatMessageType = z.infer<typeof ChatMessage>;
export type CrewAnalyticsType = z.infer<typeof CrewAnalytics>;
export type SessionStatusType = z.infer<typeof SessionStatus>;
export type SessionStateType = z.infer<typeof SessionState>;
export type SessionSnapshotType = z.infer<typeof SessionSnapshot>;

/** 小行星对外公开的部分（不含 hidden 真值） */
export interface AsteroidPublicInfo {
  name: AsteroidNameType;
  travel_cost: number;
  mined: boolean;
  /** 船员当前所在 */
  current_location: boolean;
}

/**
 * 按席位裁剪后的回合视图。
 * 传输层据此渲染 UI / 广播；情报只包含该席位此刻可见的部分。
 */
export interface RoundView {
  crew_id: string;
  role: RoleType;
  status: SessionStatusType;
  /** 当前回合号；会话未开始 / 已终止时为 null */
  round: number | null;
  scored: boolean;
  rounds_total: number;
  stage: StageType | null;
  /** 当前阶段截止的绝对时间（epoch ms） */
  deadline: number | null;
  remaining_pu: number;
  pu_per_round: number;
  location: AsteroidNameType;
  asteroids: AsteroidPublicInfo[];
  intel: IntelFactType[];
  /** 本席位当前回合已受理的行动 */
  pending_action: ActionType | null;
  /** 按可见情报推导的、当前位置的情报组合 */
  intel_state_here: IntelStateType;
  cumulative_minerals: number;
  messages: ChatMessageType[];
  last_outcome: RoundOutcomeType | null;
}

/** 阶段进入事件 */
export interface StageChangedEvent {
  type: 'stage_changed';
  crew_id: string;
  round: number;
  stage: StageType;
  deadline: number;
  /** deadline：计时器到期；early：所需行动已齐 */
  cause: 'start' | 'deadline' | 'early';
}

/** 每回合结算一次 */
export interface RoundResolvedEvent {
  type: 'round_resolved';
  crew_id: string;
  outcome: RoundOutcomeType;
  mining: MiningOutcomeType | null;
  analytics: CrewAnalyticsType;
  /** 结果阶段结束后的去向 */
  next: { round: number; stage: 'briefing' } | { round: null; stage: 'complete' };
  result_deadline: number;
}

export interface ActionAcceptedEvent {
  type: 'action_accepted';
  crew_id: string;
  round: number;
  role: RoleType;
  action: ActionType;
  replaced: boolean;
}

export interface MessagePostedEvent {
  type: 'message_posted';
  crew_id: string;
  message: ChatMessageType;
}

export interface SessionCompleteEvent {
  type: 'session_complete';
  crew_id: string;
  analytics: CrewAnalyticsType;
}

export interface SessionAbortedEvent {
  type: 'session_aborted';
  crew_id: string;
  round: number | null;
  reason: string;
}

export type SessionEvent =
  | StageChangedEvent
  | RoundResolvedEvent
  | ActionAcceptedEvent
  | MessagePostedEvent
  | SessionCompleteEvent
  | SessionAbortedEvent;

export type SessionEventName = SessionEvent['type'];
