/** 结构/领域问题统一表示（配置加载、环境变量、快照读回使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / DESTINATION_UNREACHABLE / HASH_MISMATCH）。 */
  code: string;
  /** JSON Pointer 风格或近似路径（如 "/travel_costs/Omega"）。 */
  path: string;
  /** 人类可读消息（面向运维/日志）。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}
