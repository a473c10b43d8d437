import { describe, it, expect } from 'vitest';
import { auto_runner } from './auto_runner';
import { greedy_intel_strategy, random_strategy } from './strategies';
import type { Strategy } from './strategy';
import { flat_matrix, make_config } from './__test__/fixtures';

describe('auto_runner', () => {
  it('plays the scripted greedy line on a fixed field', () => {
    // 每局都是：探测+机器人 → 深采 Alpha → 飞 Beta → 探测+机器人 → 深采 Beta → 飞 Gamma
    const summary = auto_runner({
      config: make_config({ probability_matrix: flat_matrix(1) }),
      episodes: 2,
      seed: 11,
      strategies: { navigator: greedy_intel_strategy, driller: greedy_intel_strategy },
    });

    expect(summary.episodes).toBe(2);
    expect(summary.rounds).toBe(12);
    expect(summary.episode_minerals).toEqual([180, 180]);
    expect(summary.total_minerals).toBe(360);
    expect(summary.mean_minerals).toBe(180);
    expect(summary.mining_attempts).toBe(4);
    expect(summary.mining_successes).toBe(4);
    expect(summary.attempts_by_intel.probe_plus_robot).toEqual({ attempts: 4, successes: 4 });
    expect(summary.attempts_by_intel.none).toEqual({ attempts: 0, successes: 0 });
    expect(summary.pu_spent).toBe(22);
    expect(summary.skipped).toBe(0);
    expect(summary.violations).toBe(0);
    expect(summary.outcomes).toBeUndefined();
  });

  it('is reproducible for the same seed', () => {
    const opts = {
      config: { pressure: 'low', complexity: 'low' },
      episodes: 3,
      seed: 2024,
      strategies: { navigator: random_strategy, driller: random_strategy },
      collect_outcomes: true,
    };
    const a = auto_runner(opts);
    const b = auto_runner(opts);
    expect(a).toEqual(b);
    expect(a.outcomes).toHaveLength(3);
    expect(a.outcomes?.[0]).toHaveLength(6);
  });

  it('treats a throwing strategy as silence', () => {
    const broken: Strategy = {
      choose() {
        throw new Error('boom');
      },
    };
    const summary = auto_runner({
      config: make_config({ scored_rounds: 1 }),
      episodes: 1,
      strategies: { navigator: broken },
    });
    expect(summary.violations).toBe(2);
    expect(summary.rounds).toBe(2);
  });
});
