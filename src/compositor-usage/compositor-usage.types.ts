export type UsageKind = 'preview' | 'plan'

/** Daily allowance per client for each kind. 0 switches the kind off. */
export type UsageLimits = Record<UsageKind, number>

export const USAGE_LIMITS = Symbol('USAGE_LIMITS')

export const DEFAULT_USAGE_LIMITS: UsageLimits = { preview: 100, plan: 20 }

export type UsageDecision =
  | { allowed: true; kind: UsageKind; limit: number; used: number; resetAtIso: string }
  | { allowed: false; reason: 'disabled' | 'exhausted'; kind: UsageKind; limit: number; used: number; resetAtIso: string }
