export * from './engine';
export { build_session_config } from './config/session';
export { load_config_file, load_runtime_env } from './config';
export {
  Action,
  SessionConfig,
  SessionSnapshot,
  parse_action,
  parse_session_config,
  parse_snapshot,
  ROLES,
  ACTING_ROLES,
  ASTEROID_NAMES,
  INTEL_STATES,
} from './schema';
export type {
  ActionType,
  ActionKind,
  RoleType,
  ActingRoleType,
  AsteroidNameType,
  StageType,
  IntelStateType,
  SessionConfigInput,
  SessionConfigType,
} from './schema';
export type * from './types';
