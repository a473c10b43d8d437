/** 创建会话的入参 */
export interface CreateSessionInput {
  /** 船员 ID（传输层的房间号等） */
  crew_id: string;
  /** 未解析的配置（SessionConfigInput 形状）；缺省字段取默认值 */
  config: unknown;
  /**
   * 随机种子（uint32 语义；实现用 >>> 0 规整）。
   * 小行星生成与采矿抽签都只来源于此。
   */
  seed: number;
}

/** 引擎时钟：返回 epoch 毫秒 */
export type Clock = () => number;
