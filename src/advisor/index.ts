export { OverlapAdvisor, evaluateOverlapRules, firedRules } from './overlap.js';
export { OVERLAP_RULES } from './rules.js';
export type { OverlapRule, OverlapKind } from './rules.js';
