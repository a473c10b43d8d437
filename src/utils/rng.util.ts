/** mulberry32 的可序列化形态：状态是一个 uint32，可直接写进快照 */
export interface Rng {
  next_uint32(): number;
  /** [0, 1) 区间的均匀浮点数 */
  next_float(): number;
  readonly state: number;
}

/**
 * 同样的初始种子 → 完全一致的输出序列
 * @param seed 
 * @returns 
 */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  const next_uint32 = (): number => {
    t = (t + 0x6D2B79F5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0);
  };
  return {
    next_uint32,
    next_float(): number { return next_uint32() / 4294967296; },
    get state(): number { return t >>> 0; }
  };
}

/**
 * 混合两个种子，生成新的种子
 * @param base 
 * @param salt 
 * @returns 
 */
export function mix_seed(base: number, salt: number): number { let x = (base ^ 0x9e3779b9) + (salt | 0); x ^= x << 13; x ^= x >>> 17; x ^= x << 5; return x >>> 0; }

/** 闭区间 [min, max] 上的整数 */
export function next_int(rng: Rng, min: number, max: number): number {
  return min + (rng.next_uint32() % (max - min + 1));
}
