import { ASTEROID_NAMES, type ActionType, type RoleType } from '../schema';
import type { Session } from './session';
import { ROLE_PERMISSIONS } from './validate_action';

/**
 * 候选行动全集（按种类展开参数）：
 * - travel：每个小行星一条
 * - mine：两种深度；target 省略，隐含当前位置
 */
function candidates(role: RoleType): ActionType[] {
  const out: ActionType[] = [];
  for (const kind of ROLE_PERMISSIONS[role]) {
    switch (kind) {
      case 'travel':
        for (const destination of ASTEROID_NAMES) out.push({ kind, destination });
        break;
      case 'mine':
        out.push({ kind, depth: 'shallow' }, { kind, depth: 'deep' });
        break;
      default:
        out.push({ kind });
    }
  }
  return out;
}

/**
 * 枚举 role 此刻会被受理的全部行动（与 submit 共用同一套校验）。
 * 非 action 阶段、船长、会话未运行时返回空数组。
 */
export function legal_actions(session: Session, role: RoleType): ActionType[] {
  return candidates(role).filter((action) => session.check_action(role, action).ok);
}
