export type * from './game.type';
export type * from './error.type';
export type * from './issue.type';
export type * from './session.type';
