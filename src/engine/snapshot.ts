import { issue, parse_snapshot } from '../schema';
import type { SessionSnapshotType, SessionStateType } from '../types';
import { canonical_stringify, hash_sha256 } from '../utils/canonical.util';
import { SnapshotError } from './errors';
import { Session } from './session';
import { validate_session } from './validate';

export function hash_session_state(state: SessionStateType): string {
  return hash_sha256(canonical_stringify(state));
}

/** 会话的纯 JSON 快照，带 state_hash 便于读回时校验 */
export function snapshot_session(session: Session): SessionSnapshotType {
  const state = session.to_state();
  return { snapshot_version: 1, state_hash: hash_session_state(state), session: state };
}

/**
 * 读回快照：先用 zod 校验结构，再核对 state_hash。
 * 任何一步失败都抛 SnapshotError，不会返回半成品会话。
 */
export function restore_session(input: unknown): Session {
  const parsed = parse_snapshot(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message));
    throw new SnapshotError('snapshot does not match the session schema', issues);
  }
  const { state_hash, session } = parsed.data;
  const actual = hash_session_state(session);
  if (actual !== state_hash) {
    throw new SnapshotError('snapshot state_hash mismatch', [
      issue('HASH_MISMATCH', '/state_hash', `expected ${state_hash}, computed ${actual}`),
    ]);
  }
  const { errors } = validate_session(session);
  if (errors.length) throw new SnapshotError('snapshot violates session invariants', errors);
  return Session.from_state(session);
}
