import type { RoleType, StageType } from '../schema';
import type { EngineError } from '../types';
import { err } from './errors';

/**
 * 简报阶段的沟通闸门。
 * 人类船长与 AI 船长的留言走同一路径；引擎只决定“能不能发”，不管怎么展示。
 */
export function check_message(
  from: RoleType,
  to: RoleType | 'crew',
  text: string,
  stage: StageType,
  max_length: number,
): EngineError | null {
  if (stage !== 'briefing') {
    return err('StageViolation', `messages are only accepted during briefing, not ${stage}`, { stage });
  }
  if (to === from) {
    return err('InvalidMessage', 'cannot message yourself');
  }
  const trimmed = text.trim();
  if (!trimmed) return err('InvalidMessage', 'message is empty');
  if (trimmed.length > max_length) {
    return err('InvalidMessage', `message exceeds ${max_length} characters`, { length: trimmed.length, max_length });
  }
  return null;
}
