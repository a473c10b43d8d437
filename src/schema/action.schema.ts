import { z } from 'zod';
import { AsteroidName, Depth } from './common.schema';

/**
 * 入站行动载荷。目标小行星对探针/机器人/采矿而言隐含为船员当前位置；
 * mine 可选携带 target，用于让客户端声明“我以为我们在哪”。
 */
export const TravelAction = z.object({ kind: z.literal('travel'), destination: AsteroidName }).strict();
export const SendProbeAction = z.object({ kind: z.literal('send_probe') }).strict();
export const DeployRobotAction = z.object({ kind: z.literal('deploy_robot') }).strict();
export const MineAction = z
  .object({ kind: z.literal('mine'), depth: Depth, target: AsteroidName.optional() })
  .strict();
export const NoOpAction = z.object({ kind: z.literal('no_op') }).strict();

export const Action = z.discriminatedUnion('kind', [
  TravelAction,
  SendProbeAction,
  DeployRobotAction,
  MineAction,
  NoOpAction,
]);

export type ActionType = z.infer<typeof Action>;
export type ActionKind = ActionType['kind'];
export const ACTION_KINDS: readonly ActionKind[] = ['travel', 'send_probe', 'deploy_robot', 'mine', 'no_op'];

export function parse_action(input: unknown) {
  return Action.safeParse(input);
}
