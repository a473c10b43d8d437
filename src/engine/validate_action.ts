import type {
  ActingRoleType,
  ActionKind,
  ActionType,
  AsteroidNameType,
  RoleType,
  SessionConfigType,
  StageType,
} from '../schema';
import type { Decision, PendingActionType } from '../types';
import type { AsteroidField } from './asteroids';
import type { ResourceLedger } from './ledger';
import { err } from './errors';

/** 校验一次提交所需的只读上下文 */
export interface ActionCheckContext {
  config: SessionConfigType;
  stage: StageType;
  pending: Record<ActingRoleType, PendingActionType | null>;
  location: AsteroidNameType;
  asteroids: AsteroidField;
  ledger: ResourceLedger;
  /** 之前回合已结算的探针 / 机器人次数（会话累计） */
  probes_used: number;
  robots_used: number;
}

/** 各席位允许的行动种类；船长只能沟通 */
export const ROLE_PERMISSIONS: Record<RoleType, readonly ActionKind[]> = {
  captain: [],
  navigator: ['travel', 'send_probe', 'no_op'],
  driller: ['deploy_robot', 'mine', 'no_op'],
};

export function is_acting_role(role: RoleType): role is ActingRoleType {
  return role === 'navigator' || role === 'driller';
}

/** 行动的 PU 成本：航行按目的地计价，其余查 action_costs */
export function action_cost(action: ActionType, config: SessionConfigType): number {
  switch (action.kind) {
    case 'travel':
      return config.travel_costs[action.destination];
    case 'send_probe':
      return config.action_costs.probe;
    case 'deploy_robot':
      return config.action_costs.robot;
    case 'mine':
      return action.depth === 'shallow' ? config.action_costs.mine_shallow : config.action_costs.mine_deep;
    case 'no_op':
      return 0;
  }
}

/** 停在 Alpha 时仍可原地"航行"（成本为 travel_costs.Alpha） */
const HOME_ASTEROID: AsteroidNameType = 'Alpha';

/** 采矿实际发生的位置：领航员已提交航行时为目的地，否则为当前位置 */
function mining_site(ctx: ActionCheckContext): AsteroidNameType {
  const nav = ctx.pending.navigator?.action;
  return nav?.kind === 'travel' ? nav.destination : ctx.location;
}

function cap_used(scope: 'round' | 'session', session_count: number): number {
  // 每个席位每回合只有一个行动，round 作用域下本回合之前不可能已有同类行动
  return scope === 'session' ? session_count : 0;
}

/**
 * validate_action()
 * -----------------
 * 按固定顺序检查一次提交，任何一步失败都立即返回，且不产生副作用：
 *  1) 阶段：只在 action 阶段受理；结果阶段里该席位已有定稿行动 → DuplicateAction
 *  2) 权限：席位 / 行动种类匹配，探针与机器人次数上限
 *  3) 资源：成本不超过“剩余 PU − 其他席位已占额度”
 *  4) 领域：航行目的地不能是当前位置（Alpha 除外）；采矿按航行后的位置检查目标与是否已开采
 */
export function validate_action(role: RoleType, action: ActionType, ctx: ActionCheckContext): Decision {
  // 1) 阶段
  if (ctx.stage !== 'action') {
    if (ctx.stage === 'result' && is_acting_role(role) && ctx.pending[role]) {
      return {
        ok: false,
        error: err('DuplicateAction', `${role} already has a committed action this round`, { stage: ctx.stage }),
      };
    }
    return { ok: false, error: err('StageViolation', `actions are not accepted during ${ctx.stage}`, { stage: ctx.stage }) };
  }

  // 2) 权限
  if (!is_acting_role(role)) {
    return { ok: false, error: err('RoleViolation', 'captain cannot submit actions') };
  }
  if (!ROLE_PERMISSIONS[role].includes(action.kind)) {
    return { ok: false, error: err('RoleViolation', `${role} cannot ${action.kind}`, { role, kind: action.kind }) };
  }
  if (action.kind === 'send_probe') {
    const { limit, scope } = ctx.config.probe_cap;
    const used = cap_used(scope, ctx.probes_used);
    if (used >= limit) {
      return { ok: false, error: err('RoleViolation', `probe limit reached (${limit} per ${scope})`, { used, limit, scope }) };
    }
  }
  if (action.kind === 'deploy_robot') {
    const { limit, scope } = ctx.config.robot_cap;
    const used = cap_used(scope, ctx.robots_used);
    if (used >= limit) {
      return { ok: false, error: err('RoleViolation', `robot limit reached (${limit} per ${scope})`, { used, limit, scope }) };
    }
  }

  // 3) 资源
  const cost = action_cost(action, ctx.config);
  const available = ctx.ledger.available_for(role);
  if (cost > available) {
    return {
      ok: false,
      error: err('InsufficientPU', `need ${cost} PU, ${available} available`, { cost, available }),
    };
  }

  // 4) 领域
  if (action.kind === 'travel' && action.destination === ctx.location && action.destination !== HOME_ASTEROID) {
    return { ok: false, error: err('InvalidTarget', `crew is already at ${ctx.location}`, { destination: action.destination }) };
  }
  if (action.kind === 'mine') {
    const site = mining_site(ctx);
    if (action.target && action.target !== ctx.location && action.target !== site) {
      return {
        ok: false,
        error: err('InvalidTarget', `crew is at ${ctx.location}, not ${action.target}`, { target: action.target, location: ctx.location }),
      };
    }
    const at = action.target ?? site;
    if (ctx.asteroids[at].mined) {
      return { ok: false, error: err('InvalidTarget', `${at} has already been mined`, { location: at }) };
    }
  }

  return { ok: true, cost, replaced: ctx.pending[role] !== null };
}
