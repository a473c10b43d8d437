import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError } from '../engine/errors';
import { build_session_config, load_config_file, load_runtime_env } from './index';

describe('build_session_config', () => {
  it('fills every default', () => {
    const { config, warnings } = build_session_config({ pressure: 'high', complexity: 'low' });
    expect(warnings).toEqual([]);
    expect(config.captain_type).toBe('human');
    expect(config.pu_per_round).toBe(4);
    expect(config.travel_costs).toEqual({ Alpha: 0, Beta: 1, Gamma: 2, Omega: 3 });
    expect(config.action_costs).toEqual({ probe: 1, robot: 1, mine_shallow: 1, mine_deep: 2 });
    expect(config.stage_durations_ms).toEqual({ briefing_high: 90_000, briefing_low: 180_000, action: 15_000, result: 15_000 });
    expect(config.scored_rounds).toBe(5);
    expect(config.probe_cap).toEqual({ limit: 2, scope: 'session' });
    expect(config.robot_cap).toEqual({ limit: 1, scope: 'round' });
    expect(config.unprobed_success_yield).toBe('true_value');
    expect(config.starting_location).toBe('Alpha');
    expect(config.asteroids).toBeUndefined();
  });

  it('collects every structural problem', () => {
    try {
      build_session_config({ pu_per_round: 0, travel_costs: { Pluto: 1 } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) {
        expect(e.issues.every((i) => i.code === 'SCHEMA_ERROR')).toBe(true);
        expect(e.issues.map((i) => i.path).sort()).toEqual(['/complexity', '/pressure', '/pu_per_round', '/travel_costs']);
      }
    }
  });

  it('warns about destinations the budget can never reach', () => {
    const { warnings } = build_session_config({ pressure: 'low', complexity: 'low', pu_per_round: 2 });
    expect(warnings).toEqual([
      {
        code: 'DESTINATION_UNREACHABLE',
        path: '/travel_costs/Omega',
        message: 'travel cost 3 exceeds pu_per_round 2',
        hint: undefined,
      },
    ]);
  });
});

describe('load_runtime_env', () => {
  it('reads overrides from the environment', () => {
    expect(load_runtime_env({ ACE_SEED: '7', ACE_EPISODES: '3', ACE_LOG_LEVEL: 'WARN' })).toEqual({
      seed: 7,
      episodes: 3,
      log_level: 'warn',
    });
    expect(load_runtime_env({ ACE_SEED: '' })).toEqual({});
  });

  it('rejects values it cannot use', () => {
    expect(() => load_runtime_env({ ACE_EPISODES: '0' })).toThrow(ConfigurationError);
    expect(() => load_runtime_env({ ACE_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});

describe('load_config_file', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('loads and validates a json file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'ace-config-'));
    const file = join(dir, 'session.json');
    await writeFile(file, JSON.stringify({ pressure: 'low', complexity: 'high', scored_rounds: 3 }), 'utf8');
    const { config } = await load_config_file(file);
    expect(config.scored_rounds).toBe(3);
    expect(config.pressure).toBe('low');
  });

  it('turns broken json into a configuration error', async () => {
    dir = await mkdtemp(join(tmpdir(), 'ace-config-'));
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ "pressure": ', 'utf8');
    await expect(load_config_file(file)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
