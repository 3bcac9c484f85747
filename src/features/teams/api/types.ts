/**
 * FOSSA API payloads
 */

import { z } from 'zod';

export const TeamSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    name: z.string(),
    autoAddUsers: z.boolean().optional(),
  })
  .passthrough();

export type Team = z.infer<typeof TeamSchema>;

export type TeamId = number | string;

export interface CreateTeamRequest {
  name: string;
  autoAddUsers: boolean;
}

export const CreatedTeamSchema = z
  .object({
    id: z.union([z.number(), z.string().min(1)]),
  })
  .passthrough();

export interface CreatedTeam {
  /**
   * null when the response body carried no usable id
   */
  id: TeamId | null;
  body: unknown;
}

export const IGNORE_RULE_CATEGORIES = ['licensing', 'security'] as const;

export type IgnoreRuleCategory = (typeof IGNORE_RULE_CATEGORIES)[number];

export type IgnoreRule = Record<string, unknown>;

export interface IgnoreRulePageRequest {
  category: IgnoreRuleCategory;
  page: number;
  count: number;
}

export interface IgnoreRulePage {
  rules: IgnoreRule[];
  /**
   * Entries the server sent, including any skipped as malformed
   */
  received: number;
}

export const IgnoreRuleSchema = z.record(z.unknown());

/**
 * The exceptions endpoint wraps rules in `{ exceptions: [...] }`; a bare
 * array is accepted as well. Entries are validated one by one.
 */
export const IgnoreRulePageSchema = z.union([
  z.object({ exceptions: z.array(z.unknown()) }).passthrough(),
  z.array(z.unknown()),
]);
