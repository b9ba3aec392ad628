import { z } from 'zod';

import type { RiskLevel, RiskPolicy } from '../work-item/types.js';

export const StrategyName = z.enum(['skip', 'majority', 'unanimous']);
export type StrategyName = z.infer<typeof StrategyName>;

/**
 * One risk-policy entry as written in config or front matter: a bare strategy name, or
 * `{strategy, ...params}`. Params are accepted in camelCase or snake_case.
 */
export const RiskPolicyEntry = z.union([
  StrategyName,
  z
    .object({
      strategy: StrategyName,
      escalateOnCritical: z.boolean().optional(),
      escalate_on_critical: z.boolean().optional(),
      requiresHumanConfirmation: z.boolean().optional(),
      requires_human_confirmation: z.boolean().optional()
    })
    .strict()
]);
export type RiskPolicyEntry = z.infer<typeof RiskPolicyEntry>;

export const RiskPolicyMap = z.object({
  low: RiskPolicyEntry.default('skip'),
  medium: RiskPolicyEntry.default('majority'),
  high: RiskPolicyEntry.default('unanimous')
});
export type RiskPolicyMap = z.infer<typeof RiskPolicyMap>;

/** Turn a config entry into the tagged policy. Bare names take the strict defaults. */
export function toRiskPolicy(entry: RiskPolicyEntry): RiskPolicy {
  if (typeof entry === 'string') {
    switch (entry) {
      case 'skip':
        return { kind: 'skip' };
      case 'majority':
        return { kind: 'majority', escalateOnCritical: true };
      case 'unanimous':
        return { kind: 'unanimous', requiresHumanConfirmation: true };
    }
  }

  switch (entry.strategy) {
    case 'skip':
      return { kind: 'skip' };
    case 'majority':
      return { kind: 'majority', escalateOnCritical: entry.escalateOnCritical ?? entry.escalate_on_critical ?? true };
    case 'unanimous':
      return {
        kind: 'unanimous',
        requiresHumanConfirmation: entry.requiresHumanConfirmation ?? entry.requires_human_confirmation ?? true
      };
  }
}

/** Policy in effect for an item: its own `verification` override, else the entry for its risk level. */
export function resolvePolicy(risk: RiskLevel, map: RiskPolicyMap, override?: RiskPolicyEntry): RiskPolicy {
  return toRiskPolicy(override ?? map[risk]);
}

export function describePolicy(policy: RiskPolicy): string {
  switch (policy.kind) {
    case 'skip':
      return 'skip';
    case 'majority':
      return policy.escalateOnCritical ? 'majority (escalate on critical)' : 'majority';
    case 'unanimous':
      return policy.requiresHumanConfirmation ? 'unanimous + human confirmation' : 'unanimous';
  }
}
