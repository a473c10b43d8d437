import { describe, it, expect } from 'vitest';
import { parse_session_config } from '../schema';
import type { AsteroidStateType } from '../types';
import { mulberry32 } from '../utils/rng.util';
import { intel_state_of, resolve_mining, success_probability, success_yield } from './resolver';
import { flat_matrix } from './__test__/fixtures';

const beta: AsteroidStateType = {
  name: 'Beta',
  travel_cost: 1,
  max_minerals: 100,
  shallow_cost: 2,
  deep_cost: 3,
  mined: false,
  mined_round: null,
};

function default_matrix() {
  const r = parse_session_config({ pressure: 'high', complexity: 'high' });
  if (!r.success) throw new Error('default config should parse');
  return r.data.probability_matrix;
}

describe('resolver', () => {
  it('maps probe/robot knowledge to an intel state', () => {
    expect(intel_state_of(false, false)).toBe('none');
    expect(intel_state_of(true, false)).toBe('probe_only');
    expect(intel_state_of(false, true)).toBe('robot_only');
    expect(intel_state_of(true, true)).toBe('probe_plus_robot');
  });

  it('uses the default probability table', () => {
    const m = default_matrix();
    expect(success_probability(m, 'shallow', 'none')).toBe(0.15);
    expect(success_probability(m, 'shallow', 'probe_only')).toBe(0.35);
    expect(success_probability(m, 'shallow', 'robot_only')).toBe(0.3);
    expect(success_probability(m, 'shallow', 'probe_plus_robot')).toBe(0.55);
    expect(success_probability(m, 'deep', 'none')).toBe(0.3);
    expect(success_probability(m, 'deep', 'probe_only')).toBe(0.55);
    expect(success_probability(m, 'deep', 'robot_only')).toBe(0.5);
    expect(success_probability(m, 'deep', 'probe_plus_robot')).toBe(0.8);
  });

  it('yields the true value when probed, otherwise the fallback', () => {
    expect(success_yield(beta, 'probe_only', 40)).toBe(100);
    expect(success_yield(beta, 'robot_only', 40)).toBe(40);
    expect(success_yield(beta, 'none', 'true_value')).toBe(100);
  });

  it('draws exactly once from the session rng', () => {
    const seed = 12345;
    const expected = mulberry32(seed);
    const draw = expected.next_float();

    const input = {
      round: 2,
      asteroid: beta,
      depth: 'shallow' as const,
      intel_state: 'none' as const,
      matrix: default_matrix(),
      rng_state: seed,
      cost_paid: 1,
      unprobed_success_yield: 'true_value' as const,
    };
    const a = resolve_mining(input);
    const b = resolve_mining(input);

    expect(a).toEqual(b);
    expect(a.outcome.draw).toBe(draw);
    expect(a.rng_state).toBe(expected.state);
    expect(a.outcome.success).toBe(draw < 0.15);
    expect(a.outcome.probability).toBe(0.15);
    expect(a.outcome.cost_paid).toBe(1);
  });

  it('succeeds with p = 1 and fails with p = 0', () => {
    const base = {
      round: 1,
      asteroid: beta,
      depth: 'deep' as const,
      intel_state: 'robot_only' as const,
      rng_state: 7,
      cost_paid: 2,
      unprobed_success_yield: 25,
    };
    const win = resolve_mining({ ...base, matrix: flat_matrix(1) });
    expect(win.outcome.success).toBe(true);
    expect(win.outcome.minerals_gained).toBe(25);

    const lose = resolve_mining({ ...base, matrix: flat_matrix(0) });
    expect(lose.outcome.success).toBe(false);
    expect(lose.outcome.minerals_gained).toBe(0);
  });
});
