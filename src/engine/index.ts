export { Session } from './session';
export type { SessionSummary } from './session';
export { CrewOrchestrator } from './orchestrator';
export type { OrchestratorOptions } from './orchestrator';
export { RoundStateMachine } from './round_machine';
export type { CrewState, RoundStep, StageEntry } from './round_machine';
export { ResourceLedger } from './ledger';
export { IntelStore } from './intel_store';
export { intel_state_of, success_probability, success_yield, resolve_mining } from './resolver';
export { validate_action, action_cost, ROLE_PERMISSIONS, is_acting_role } from './validate_action';
export type { ActionCheckContext } from './validate_action';
export { check_message } from './comms';
export { build_asteroid_field } from './asteroids';
export type { AsteroidField } from './asteroids';
export { legal_actions } from './legal_actions';
export { snapshot_session, restore_session, hash_session_state } from './snapshot';
export { validate_session } from './validate';
export { Mailbox } from './mailbox';
export { ConfigurationError, SnapshotError, err } from './errors';
export { auto_runner } from './auto_runner';
export type { AutoRunnerOptions, AutoRunnerSummary, IntelBucket } from './auto_runner';
export type { Strategy, StrategyContext } from './strategy';
export { first_strategy, random_strategy, greedy_intel_strategy } from './strategies';
