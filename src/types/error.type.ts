/**
 * 可恢复的拒绝原因（以值返回，不抛出）。
 * 提交方收到后可以在阶段截止前重试；DuplicateAction 在行动阶段结束后是终局的。
 */
export type EngineErrorCode =
  | 'StageViolation'
  | 'RoleViolation'
  | 'InsufficientPU'
  | 'InvalidTarget'
  | 'DuplicateAction'
  | 'InvalidMessage'
  | 'UnknownCrew';

// 错误
export interface EngineError { code: EngineErrorCode; message: string; details?: unknown }

/** 行动/留言的受理结果 */
export type Decision =
  | { ok: true; cost: number; replaced: boolean }
  | { ok: false; error: EngineError };

/** 编排器层的通用返回：成功时携带附加字段 */
export type Result<T extends object = Record<never, never>> =
  | ({ ok: true } & T)
  | { ok: false; error: EngineError };
