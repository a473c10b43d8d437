import { createHash } from "crypto";

/**
 * 会话状态的规范化 JSON：对象 key 逐层按字典序排列，值为 null / undefined 的字段省略。
 * 快照的 state_hash 在此基础上计算，字段顺序不同的同一状态得到同一个哈希。
 */
export function canonical_stringify(input: unknown): string {
  return JSON.stringify(canonical_value(input));
}

/** "sha256:" + 十六进制摘要 */
export function hash_sha256(text: string): string {
  return `sha256:${createHash("sha256").update(text, "utf8").digest("hex")}`;
}

function canonical_value(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(canonical_value);
  if (typeof v !== "object" || v === null) return v;

  const out: Record<string, unknown> = {};
  for (const [k, val] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (val === null || val === undefined) continue;
    out[k] = canonical_value(val);
  }
  return out;
}
