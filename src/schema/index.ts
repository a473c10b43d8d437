import type { ValidationIssue } from '../types';

export * from './common.schema';
export * from './action.schema';
export * from './config.schema';
export * from './state.schema';


/** 构造统一的校验问题对象（配置加载 / 快照读回复用） */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return { code, path, message, hint };
}
