import type { EngineError, EngineErrorCode, ValidationIssue } from '../types';

/** 构造 EngineError 的小工具（统一结构） */
export function err(code: EngineErrorCode, message: string, details?: unknown): EngineError {
  return details === undefined ? { code, message } : { code, message, details };
}

/** 会话配置不完整或不合法：只在创建会话时抛出，会话不会启动 */
export class ConfigurationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`invalid session configuration: ${issues.map((i) => `[${i.code}] ${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** 快照结构不合法或哈希对不上 */
export class SnapshotError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'SnapshotError';
    this.issues = issues;
  }
}
