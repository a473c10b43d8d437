#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { load_config_file, load_runtime_env } from "../config";
import { auto_runner } from "../engine/auto_runner";
import { ConfigurationError } from "../engine/errors";
import { first_strategy, greedy_intel_strategy, random_strategy } from "../engine/strategies";
import type { Strategy } from "../engine/strategy";
import { logger, set_log_level } from "../utils/logger.util";

/** 生成一个“写入器”：接收字符串和文件名，落到 baseDir 下；若是 JSON 字符串则按缩进重排 */
export function create_folder_writer(baseDir: string, spaces = 2) {
  return async (content: string, filename: string): Promise<string> => {
    const target = join(baseDir, filename);
    await mkdir(dirname(target), { recursive: true });

    let text: string;
    try {
      text = JSON.stringify(JSON.parse(content), null, spaces);
    } catch {
      text = content;
    }
    if (!text.endsWith("\n")) text += "\n";

    await writeFile(target, text, "utf8");
    return target;
  };
}

const STRATEGIES: Record<string, Strategy> = {
  first: first_strategy,
  random: random_strategy,
  greedy: greedy_intel_strategy,
};

type SimulateOptions = {
  episodes?: string;
  seed?: string;
  strategy: string;
  outcomes?: boolean;
  out?: string;
};

function to_int(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new Error(`--${name} must be a non-negative integer, got '${raw}'`);
  return n;
}

function report(e: unknown): void {
  if (e instanceof ConfigurationError) {
    console.error(`❌ Invalid configuration (${e.issues.length} issue(s)):`);
    for (const i of e.issues) console.error(`  - [${i.code}] ${i.path} : ${i.message}`);
  } else if (e instanceof Error && "code" in e && e.code === "ENOENT") {
    console.error(`❌ Not found: ${"path" in e ? String(e.path) : "config file"}`);
  } else {
    console.error(`💥 Unexpected error: ${e instanceof Error ? e.message : String(e)}`);
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name("ace")
  .description("Asteroid crew engine: configuration checks and strategy simulations")
  .version("0.1.0");

program
  .command("check-config")
  .argument("<config>", "session configuration JSON file")
  .description("validate a session configuration and print the resolved values")
  .action(async (config_path: string) => {
    try {
      const env = load_runtime_env();
      if (env.log_level) set_log_level(env.log_level);
      const { config, warnings } = await load_config_file(resolve(config_path));
      for (const w of warnings) console.warn(`⚠️  [${w.code}] ${w.path} : ${w.message}`);
      console.log(JSON.stringify(config, null, 2));
    } catch (e) {
      report(e);
    }
  });

program
  .command("simulate")
  .argument("<config>", "session configuration JSON file")
  .description("play whole sessions with built-in strategies on a virtual clock")
  .option("-n, --episodes <n>", "number of episodes (default: ACE_EPISODES or 10)")
  .option("-s, --seed <n>", "base seed (default: ACE_SEED or 0)")
  .option("--strategy <name>", "first | random | greedy", "greedy")
  .option("--outcomes", "include every round outcome in the output", false)
  .option("-o, --out <file>", "output file name next to the config (default: <config>.sim.json)")
  .action(async (config_path: string, opts: SimulateOptions) => {
    try {
      const env = load_runtime_env();
      if (env.log_level) set_log_level(env.log_level);
      const strategy = STRATEGIES[opts.strategy];
      if (!strategy) throw new Error(`unknown strategy '${opts.strategy}' (first | random | greedy)`);

      const file = resolve(config_path);
      const { config } = await load_config_file(file);
      const episodes = to_int(opts.episodes, "episodes") ?? env.episodes ?? 10;
      const seed = to_int(opts.seed, "seed") ?? env.seed ?? 0;

      logger.info("simulate_start", { config: file, episodes, seed, strategy: opts.strategy });
      const summary = auto_runner({
        config,
        episodes,
        seed,
        strategies: { navigator: strategy, driller: strategy },
        collect_outcomes: opts.outcomes,
      });

      const out_name = opts.out ?? `${basename(file).replace(/\.json$/, "")}.sim.json`;
      const write = create_folder_writer(dirname(file));
      const target = await write(JSON.stringify({ seed, strategy: opts.strategy, summary }), out_name);
      console.log(`✅ ${episodes} episode(s), mean minerals ${summary.mean_minerals.toFixed(1)} → ${target}`);
    } catch (e) {
      report(e);
    }
  });

program.parseAsync(process.argv).catch(report);
