/**
 * Session + 回合状态机的场景测试
 *
 * 时钟全部显式传入；默认时长：高压简报 90s，行动 15s，结果 15s。
 * 第 0 回合：briefing [0, 90000) → action [90000, 105000) → result [.., +15000)
 */
import { describe, it, expect } from 'vitest';
import type { SessionEvent } from '../../types';
import { Session } from '../session';
import { flat_matrix, make_config } from './fixtures';

function started(over: Record<string, unknown> = {}, seed = 42): Session {
  const s = Session.create({ crew_id: 'crew-1', config: make_config(over), seed });
  s.start(0);
  return s;
}

/** 开局并推进到第 0 回合的 action 阶段 */
function in_action(over: Record<string, unknown> = {}): Session {
  const s = started(over);
  s.tick(90_000);
  return s;
}

function types(events: SessionEvent[]): string[] {
  return events.map((e) => (e.type === 'stage_changed' ? `${e.type}:${e.stage}:${e.cause}` : e.type));
}

describe('Session rounds', () => {
  it('starts in waiting and enters the training briefing on start', () => {
    const s = Session.create({ crew_id: 'crew-1', config: make_config(), seed: 1 });
    expect(s.status).toBe('waiting');
    expect(s.view('captain').round).toBeNull();
    expect(s.start(1_000)).toBe(true);
    expect(s.start(2_000)).toBe(false);
    expect(s.round_number).toBe(0);
    expect(s.stage).toBe('briefing');
    expect(s.deadline).toBe(91_000);
  });

  it('uses the low-pressure briefing length', () => {
    const s = started({ pressure: 'low' });
    expect(s.deadline).toBe(180_000);
  });

  it('rejects actions during briefing', () => {
    const s = started();
    const d = s.submit_action(0, 'navigator', { kind: 'send_probe' }, 1_000);
    expect(d.ok ? null : d.error.code).toBe('StageViolation');
  });

  it('resolves travel then mining at the new asteroid', () => {
    const s = in_action();
    expect(s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Beta' }, 91_000)).toEqual({
      ok: true,
      cost: 1,
      replaced: false,
    });
    expect(s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow' }, 92_000)).toEqual({
      ok: true,
      cost: 1,
      replaced: false,
    });

    // 两个席位都到齐，提前进入 result
    expect(s.stage).toBe('result');
    expect(s.deadline).toBe(107_000);

    const events = s.drain_events();
    expect(types(events)).toEqual([
      'stage_changed:briefing:start',
      'stage_changed:action:deadline',
      'action_accepted',
      'action_accepted',
      'stage_changed:result:early',
      'round_resolved',
    ]);

    const resolved = events[5];
    if (resolved.type !== 'round_resolved') throw new Error('expected round_resolved');
    const { outcome } = resolved;
    expect(outcome.location_before).toBe('Alpha');
    expect(outcome.location_after).toBe('Beta');
    expect(outcome.remaining_pu).toBe(2);
    expect(outcome.pu_spent).toEqual({ navigator: 1, driller: 1 });
    expect(outcome.mining?.asteroid).toBe('Beta');
    expect(outcome.mining?.intel_state).toBe('none');
    expect(outcome.mining?.probability).toBe(0.15);
    expect(resolved.next).toEqual({ round: 1, stage: 'briefing' });
    expect(resolved.result_deadline).toBe(107_000);
    expect(s.location).toBe('Beta');
  });

  it('counts training minerals apart from the scored total', () => {
    const s = in_action({ probability_matrix: flat_matrix(1) });
    s.submit_action(0, 'navigator', { kind: 'no_op' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'deep' }, 91_000);
    expect(s.analytics.training_minerals).toBe(80);
    expect(s.analytics.cumulative_minerals).toBe(0);
    expect(s.analytics.cumulative_pu).toEqual({ captain: 0, navigator: 0, driller: 2 });
  });

  it('keeps only the last submission from a role', () => {
    const s = in_action();
    s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Omega' }, 91_000);
    expect(s.submit_action(0, 'navigator', { kind: 'send_probe' }, 92_000)).toEqual({ ok: true, cost: 1, replaced: true });
    expect(s.view('navigator').pending_action).toEqual({ kind: 'send_probe' });
    // Omega 的 3 PU 已释放，司钻还能深层开采
    expect(s.check_action('driller', { kind: 'mine', depth: 'deep' }).ok).toBe(true);
  });

  it('fills a silent role with an automatic no-op at the deadline', () => {
    const s = in_action();
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'deep' }, 91_000);
    expect(s.stage).toBe('action');
    s.tick(105_000);
    expect(s.stage).toBe('result');

    const outcome = s.summary().rounds[0];
    expect(outcome.committed.navigator).toEqual({
      role: 'navigator',
      action: { kind: 'no_op' },
      cost: 0,
      submitted_at: 105_000,
      auto: true,
    });
    expect(outcome.committed.driller.auto).toBe(false);
    expect(outcome.remaining_pu).toBe(2);
    expect(outcome.mining?.depth).toBe('deep');
  });

  it('rejects late submissions once the round is final', () => {
    const s = in_action();
    s.submit_action(0, 'navigator', { kind: 'send_probe' }, 91_000);

    // 截止后到达：先追平时钟，看到的是已定稿的 result
    const late = s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Gamma' }, 106_000);
    expect(late.ok ? null : late.error.code).toBe('DuplicateAction');
    const silent = s.submit_action(0, 'driller', { kind: 'deploy_robot' }, 106_000);
    expect(silent.ok ? null : silent.error.code).toBe('DuplicateAction');
    const captain = s.submit_action(0, 'captain', { kind: 'no_op' }, 106_000);
    expect(captain.ok ? null : captain.error.code).toBe('StageViolation');

    // 下一回合开始后，旧回合号仍是 DuplicateAction，新回合在简报期是 StageViolation
    const old = s.submit_action(0, 'navigator', { kind: 'no_op' }, 121_000);
    expect(old.ok ? null : old.error.code).toBe('DuplicateAction');
    expect(s.round_number).toBe(1);
    const early = s.submit_action(1, 'navigator', { kind: 'no_op' }, 121_000);
    expect(early.ok ? null : early.error.code).toBe('StageViolation');
    const future = s.submit_action(2, 'navigator', { kind: 'no_op' }, 121_000);
    expect(future.ok ? null : future.error.code).toBe('StageViolation');
  });

  it('prevents two roles from jointly overspending', () => {
    const s = in_action();
    expect(s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Omega' }, 91_000).ok).toBe(true);
    const deep = s.submit_action(0, 'driller', { kind: 'mine', depth: 'deep' }, 92_000);
    expect(deep.ok ? null : deep.error.code).toBe('InsufficientPU');
    expect(s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow' }, 93_000).ok).toBe(true);
    expect(s.summary().rounds[0].remaining_pu).toBe(0);
  });

  it('rejects a mine target other than the current location', () => {
    const s = in_action();
    const d = s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow', target: 'Beta' }, 91_000);
    expect(d.ok ? null : d.error.code).toBe('InvalidTarget');
  });

  it('skips a mine whose target no longer matches after travel', () => {
    const s = in_action();
    s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Beta' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow', target: 'Alpha' }, 92_000);
    const outcome = s.summary().rounds[0];
    expect(outcome.mining).toBeNull();
    expect(outcome.skipped).toEqual([
      { role: 'driller', kind: 'mine', reason: 'InvalidTarget', message: 'crew moved to Beta, mine target was Alpha' },
    ]);
    expect(outcome.pu_spent).toEqual({ navigator: 1, driller: 0 });
    expect(outcome.remaining_pu).toBe(3);
  });

  it('mines the destination when the crew leaves an exhausted asteroid', () => {
    const s = in_action({ probability_matrix: flat_matrix(1) });
    s.submit_action(0, 'navigator', { kind: 'no_op' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow' }, 92_000);
    expect(s.summary().rounds[0].mining?.asteroid).toBe('Alpha');

    // 第 1 回合：107000 简报 → 197000 行动
    s.tick(197_000);
    expect(s.round_number).toBe(1);
    expect(s.stage).toBe('action');
    expect(s.submit_action(1, 'navigator', { kind: 'travel', destination: 'Beta' }, 198_000)).toEqual({
      ok: true,
      cost: 1,
      replaced: false,
    });
    expect(s.submit_action(1, 'driller', { kind: 'mine', depth: 'shallow' }, 199_000)).toEqual({
      ok: true,
      cost: 1,
      replaced: false,
    });

    const outcome = s.summary().rounds[1];
    expect(outcome.location_after).toBe('Beta');
    expect(outcome.skipped).toEqual([]);
    expect(outcome.mining?.asteroid).toBe('Beta');
    expect(outcome.mining?.minerals_gained).toBe(100);
    expect(s.analytics.cumulative_minerals).toBe(100);
  });

  it('still rejects a mine on an exhausted asteroid when nobody travels', () => {
    const s = in_action({ probability_matrix: flat_matrix(1) });
    s.submit_action(0, 'navigator', { kind: 'no_op' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow' }, 92_000);
    s.tick(197_000);
    s.submit_action(1, 'navigator', { kind: 'send_probe' }, 198_000);
    const d = s.submit_action(1, 'driller', { kind: 'mine', depth: 'deep' }, 199_000);
    expect(d.ok ? null : d.error.message).toBe('Alpha has already been mined');
  });

  it('treats travel to Alpha while at Alpha as a free stay', () => {
    const s = in_action();
    expect(s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Alpha' }, 91_000)).toEqual({
      ok: true,
      cost: 0,
      replaced: false,
    });
    s.submit_action(0, 'driller', { kind: 'no_op' }, 92_000);
    const outcome = s.summary().rounds[0];
    expect(outcome.location_after).toBe('Alpha');
    expect(outcome.pu_spent).toEqual({ navigator: 0, driller: 0 });
    expect(outcome.skipped).toEqual([]);
  });
});

describe('Session intel visibility', () => {
  it('hides a high-complexity probe from the driller until the next round', () => {
    const s = in_action({ complexity: 'high' });
    s.submit_action(0, 'navigator', { kind: 'send_probe' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow' }, 92_000);

    // 同一回合的探针对司钻不可见，采矿按 none 结算
    const outcome = s.summary().rounds[0];
    expect(outcome.intel_recorded).toEqual([
      { asteroid: 'Alpha', kind: 'max_minerals', value: 80, discoverer: 'navigator', round: 0 },
    ]);
    expect(outcome.mining?.intel_state).toBe('none');
    expect(outcome.mining?.probability).toBe(0.15);
    expect(s.view('navigator').intel).toHaveLength(1);
    expect(s.view('driller').intel).toHaveLength(0);

    s.tick(107_000);
    expect(s.round_number).toBe(1);
    expect(s.view('driller').intel).toHaveLength(1);
    expect(s.view('driller').intel_state_here).toBe('probe_only');
    expect(s.view('captain').intel_state_here).toBe('probe_only');
  });

  it('lets the driller use a low-complexity probe in the same round', () => {
    const s = in_action({ complexity: 'low' });
    s.submit_action(0, 'navigator', { kind: 'send_probe' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'mine', depth: 'shallow' }, 92_000);
    const outcome = s.summary().rounds[0];
    expect(outcome.mining?.intel_state).toBe('probe_only');
    expect(outcome.mining?.probability).toBe(0.35);
    expect(s.view('captain').intel).toHaveLength(1);
  });

  it('records robot costs for the asteroid the crew travelled to', () => {
    const s = in_action({ complexity: 'low' });
    s.submit_action(0, 'navigator', { kind: 'travel', destination: 'Gamma' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'deploy_robot' }, 92_000);
    expect(s.summary().rounds[0].intel_recorded).toEqual([
      { asteroid: 'Gamma', kind: 'shallow_cost', value: 1, discoverer: 'driller', round: 0 },
      { asteroid: 'Gamma', kind: 'deep_cost', value: 4, discoverer: 'driller', round: 0 },
    ]);
    expect(s.view('navigator').intel_state_here).toBe('robot_only');
  });
});

describe('Session lifecycle', () => {
  it('plays every round to completion when nobody acts', () => {
    const s = started({ scored_rounds: 1 });
    s.tick(10_000_000);
    expect(s.status).toBe('complete');
    expect(s.round_number).toBeNull();

    const { rounds, analytics } = s.summary();
    expect(rounds.map((r) => [r.round, r.scored])).toEqual([
      [0, false],
      [1, true],
    ]);
    expect(rounds.every((r) => r.mining === null && r.remaining_pu === 4)).toBe(true);
    expect(analytics.cumulative_pu_team).toBe(0);

    const events = s.drain_events();
    expect(events.filter((e) => e.type === 'session_complete')).toHaveLength(1);
    const last = events.filter((e) => e.type === 'round_resolved').pop();
    expect(last?.type === 'round_resolved' ? last.next : null).toEqual({ round: null, stage: 'complete' });
  });

  it('anchors each stage at the previous deadline when the clock jumps', () => {
    const s = started({ scored_rounds: 2 });
    // 0: 0 → 90000 → 105000 → 120000；1: 120000 → 210000 → 225000 → 240000
    s.tick(230_000);
    expect(s.round_number).toBe(1);
    expect(s.stage).toBe('result');
    expect(s.deadline).toBe(240_000);
  });

  it('gates briefing messages and keeps them per round', () => {
    const s = started();
    expect(s.post_message('captain', 'probe Alpha first', 'crew', 1_000)).toEqual({ ok: true, cost: 0, replaced: false });
    expect(s.post_message('navigator', 'ok', 'captain', 2_000).ok).toBe(true);
    const view = s.view('driller');
    expect(view.messages.map((m) => m.text)).toEqual(['probe Alpha first']);
    expect(s.view('captain').messages).toHaveLength(2);

    const late = s.post_message('captain', 'hurry', 'crew', 95_000);
    expect(late.ok ? null : late.error.code).toBe('StageViolation');
  });

  it('aborts once and then rejects input', () => {
    const s = in_action();
    s.drain_events();
    expect(s.abort('operator stop')).toBe(true);
    expect(s.abort('again')).toBe(false);
    expect(s.status).toBe('aborted');
    expect(s.drain_events()).toEqual([
      { type: 'session_aborted', crew_id: 'crew-1', round: 0, reason: 'operator stop' },
    ]);
    const d = s.submit_action(0, 'navigator', { kind: 'no_op' }, 91_000);
    expect(d.ok ? null : d.error.code).toBe('StageViolation');
    expect(s.summary().abort_reason).toBe('operator stop');
  });

  it('keeps the aborted round private under high complexity', () => {
    const s = in_action({ complexity: 'high' });
    s.submit_action(0, 'navigator', { kind: 'send_probe' }, 91_000);
    s.submit_action(0, 'driller', { kind: 'no_op' }, 92_000);
    expect(s.stage).toBe('result');
    s.abort('operator stop');

    expect(s.view('navigator').intel).toEqual([
      { asteroid: 'Alpha', kind: 'max_minerals', value: 80, discoverer: 'navigator', round: 0 },
    ]);
    expect(s.view('driller').intel).toEqual([]);
    expect(s.view('captain').intel_state_here).toBe('none');
  });
});
