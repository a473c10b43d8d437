/**
 * 自动对局运行器（Auto Runner）
 * 在给定配置与策略下批量模拟整局会话（虚拟时钟，不等真实时间），
 * 产出矿物、PU、采矿成功率（按情报组合分桶）、被跳过的效果与可选的回合轨迹。
 */
import { ACTING_ROLES, type ActingRoleType, type IntelStateType } from '../schema';
import type { RoundOutcomeType } from '../types';
import { logger } from '../utils/logger.util';
import { mix_seed, mulberry32, type Rng } from '../utils/rng.util';
import { legal_actions } from './legal_actions';
import { Session } from './session';
import { first_strategy } from './strategies';
import type { Strategy } from './strategy';

/**
 * 自动运行器的配置项
 * - strategies 按席位映射，缺省回退到 first_strategy
 */
export interface AutoRunnerOptions {
  /** 未解析的会话配置 */
  config: unknown;
  episodes: number;
  /** 基础种子；第 ep 局使用 mix_seed(seed, ep) */
  seed?: number;
  strategies?: Partial<Record<ActingRoleType, Strategy>>;
  /** when true, collect the round outcomes of each episode */
  collect_outcomes?: boolean;
}

export interface IntelBucket {
  attempts: number;
  successes: number;
}

/**
 * 自动运行摘要结果
 */
export interface AutoRunnerSummary {
  episodes: number;
  rounds: number;
  /** 计分回合的矿物总和 */
  total_minerals: number;
  mean_minerals: number;
  mining_attempts: number;
  mining_successes: number;
  pu_spent: number;
  /** 按结算时的情报组合统计采矿 */
  attempts_by_intel: Record<IntelStateType, IntelBucket>;
  /** 结算时因前提不再成立而跳过的效果数 */
  skipped: number;
  /** 策略抛错的次数（该席位本回合按沉默处理） */
  violations: number;
  episode_minerals: number[];
  outcomes?: RoundOutcomeType[][];
}

function empty_buckets(): Record<IntelStateType, IntelBucket> {
  return {
    none: { attempts: 0, successes: 0 },
    probe_only: { attempts: 0, successes: 0 },
    robot_only: { attempts: 0, successes: 0 },
    probe_plus_robot: { attempts: 0, successes: 0 },
  };
}

/**
 * 单局：
 * - briefing 直接跳到截止
 * - action 阶段按 navigator → driller 的顺序让策略从 legal_actions 中选择并提交
 * - 其余交给 tick（含提前进入 result、No-Op 补位、结算、开下一回合）
 */
function play_episode(
  config: unknown,
  seed: number,
  ep: number,
  strategies: AutoRunnerOptions['strategies'],
  on_violation: () => void,
): Session {
  const session = Session.create({ crew_id: `sim-${ep}`, config, seed });
  const rngs: Record<ActingRoleType, Rng> = {
    navigator: mulberry32(mix_seed(seed, 1)),
    driller: mulberry32(mix_seed(seed, 2)),
  };

  let now = 0;
  let acted_round = -1;
  session.start(now);

  while (session.status === 'running') {
    const round = session.round_number;
    if (round !== null && session.stage === 'action' && acted_round !== round) {
      acted_round = round;
      for (const role of ACTING_ROLES) {
        const strat = strategies?.[role] ?? first_strategy;
        const actions = legal_actions(session, role);
        try {
          const choice = strat.choose(actions, { role, view: session.view(role), rng: rngs[role] });
          if (choice) session.submit_action(round, role, choice, now);
        } catch (e) {
          on_violation();
          logger.warn('strategy_failed', { ep, round, role, error: e instanceof Error ? e.message : String(e) });
        }
        if (session.stage !== 'action') break;
      }
    }
    // 虚拟时钟：直接跳到当前阶段的截止时间
    now = session.deadline ?? now;
    session.tick(now);
    session.drain_events();
  }
  return session;
}

export function auto_runner(opts: AutoRunnerOptions): AutoRunnerSummary {
  const { config, episodes, seed = 0, strategies, collect_outcomes } = opts;

  let rounds = 0;
  let total_minerals = 0;
  let mining_attempts = 0;
  let mining_successes = 0;
  let pu_spent = 0;
  let skipped = 0;
  let violations = 0;
  const attempts_by_intel = empty_buckets();
  const episode_minerals: number[] = [];
  const outcomes: RoundOutcomeType[][] = [];

  for (let ep = 0; ep < episodes; ep++) {
    // 每局种子由基础种子派生，便于复现
    const session = play_episode(config, mix_seed(seed >>> 0, ep), ep, strategies, () => {
      violations++;
    });
    const summary = session.summary();

    for (const r of summary.rounds) {
      rounds++;
      skipped += r.skipped.length;
      if (r.mining) {
        mining_attempts++;
        attempts_by_intel[r.mining.intel_state].attempts++;
        if (r.mining.success) {
          mining_successes++;
          attempts_by_intel[r.mining.intel_state].successes++;
        }
      }
    }
    pu_spent += summary.analytics.cumulative_pu_team;
    total_minerals += summary.analytics.cumulative_minerals;
    episode_minerals.push(summary.analytics.cumulative_minerals);
    if (collect_outcomes) outcomes.push(summary.rounds);
  }

  const result: AutoRunnerSummary = {
    episodes,
    rounds,
    total_minerals,
    mean_minerals: episodes > 0 ? total_minerals / episodes : 0,
    mining_attempts,
    mining_successes,
    pu_spent,
    attempts_by_intel,
    skipped,
    violations,
    episode_minerals,
    outcomes: collect_outcomes ? outcomes : undefined,
  };
  logger.info('auto_runner_done', { episodes, rounds, total_minerals, mining_attempts, mining_successes });
  return result;
}
