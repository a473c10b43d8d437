import { ASTEROID_NAMES } from "../schema";
import type { SessionStateType, ValidationIssue } from "../types";

/**
 * 会话状态的结构之外的不变量（快照读回时使用）：
 * zod 只能保证形状，这里检查字段之间的关系。
 */
export function validate_session(state: SessionStateType) {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const names = new Set<string>(ASTEROID_NAMES);

  // —— ASTEROID_KEY：asteroids[k].name 必须等于 k
  for (const name of ASTEROID_NAMES) {
    const a = state.asteroids[name];
    if (a.name !== name) {
      errors.push({ code: "INVARIANT_ASTEROID_KEY", path: `/asteroids/${name}/name`, message: `asteroid '${name}' is named '${a.name}'` });
    }
    if (a.mined !== (a.mined_round !== null)) {
      errors.push({ code: "INVARIANT_MINED_ROUND", path: `/asteroids/${name}`, message: `mined=${a.mined} but mined_round=${a.mined_round}` });
    }
  }

  // —— INTEL_REF：情报必须指向已知小行星，且不能来自未来回合
  const current = state.round?.number ?? Number.MAX_SAFE_INTEGER;
  state.intel.forEach((f, i) => {
    if (!names.has(f.asteroid)) {
      errors.push({ code: "INVARIANT_INTEL_REF", path: `/intel/${i}/asteroid`, message: `unknown asteroid '${f.asteroid}'` });
    }
    if (f.round > current) {
      errors.push({ code: "INVARIANT_INTEL_ROUND", path: `/intel/${i}/round`, message: `fact from round ${f.round} > current ${current}` });
    }
  });

  // —— LEDGER：剩余 PU 在 [0, budget]，占额度不超过剩余
  const round = state.round;
  if (round) {
    const l = round.ledger;
    if (l.remaining < 0 || l.remaining > l.budget) {
      errors.push({ code: "INVARIANT_LEDGER_RANGE", path: "/round/ledger/remaining", message: `remaining ${l.remaining} outside [0, ${l.budget}]` });
    }
    if (l.holds.navigator + l.holds.driller > l.remaining) {
      errors.push({ code: "INVARIANT_LEDGER_HOLDS", path: "/round/ledger/holds", message: "holds exceed remaining PU" });
    }
    // —— PENDING_ROLE：pending 的键与 role 一致
    for (const role of ["navigator", "driller"] as const) {
      const p = round.pending[role];
      if (p && p.role !== role) {
        errors.push({ code: "INVARIANT_PENDING_ROLE", path: `/round/pending/${role}/role`, message: `pending action belongs to ${p.role}` });
      }
    }
    if (round.stage !== "result" && round.outcome) {
      errors.push({ code: "INVARIANT_OUTCOME_STAGE", path: "/round/outcome", message: `outcome present during ${round.stage}` });
    }
  }

  // —— STATUS：running 必须有回合，其余状态没有
  if ((state.status === "running") !== (state.round !== null)) {
    errors.push({ code: "INVARIANT_STATUS_ROUND", path: "/round", message: `status ${state.status} with round ${round ? round.number : "null"}` });
  }

  if (state.aborted_in_round !== null && state.status !== "aborted") {
    errors.push({ code: "INVARIANT_ABORTED_ROUND", path: "/aborted_in_round", message: `status ${state.status} with aborted_in_round ${state.aborted_in_round}` });
  }

  if (state.history.length > state.config.scored_rounds + 1) {
    warnings.push({ code: "HISTORY_OVERFLOW", path: "/history", message: `${state.history.length} rounds recorded` });
  }

  return { errors, warnings };
}
