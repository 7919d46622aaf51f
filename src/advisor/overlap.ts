import { OVERLAP_RULES, OverlapRule } from './rules.js';

/**
 * Rules whose pair is fully selected, in rule order.
 */
export function firedRules(
    selection: Iterable<string>,
    rules: readonly OverlapRule[] = OVERLAP_RULES
): OverlapRule[] {
    const selected = new Set(selection);
    return rules.filter(rule => rule.pair.every(key => selected.has(key)));
}

export function evaluateOverlapRules(
    selection: Iterable<string>,
    rules: readonly OverlapRule[] = OVERLAP_RULES
): string[] {
    return firedRules(selection, rules).map(rule => rule.message);
}

/**
 * Flags likely naming confusions for a selection of construct keys.
 */
export class OverlapAdvisor {
    private readonly rules: readonly OverlapRule[];

    constructor(rules: readonly OverlapRule[] = OVERLAP_RULES) {
        this.rules = Object.freeze([...rules]);
    }

    /**
     * Returns a new advisor with extra rules evaluated after the current ones.
     */
    withRules(extra: readonly OverlapRule[]): OverlapAdvisor {
        return new OverlapAdvisor([...this.rules, ...extra]);
    }

    getRules(): readonly OverlapRule[] {
        return this.rules;
    }

    warnings(selection: Iterable<string>): string[] {
        return evaluateOverlapRules(selection, this.rules);
    }

    /**
     * Rules that fired, for callers that want the kind as well as the text.
     */
    matches(selection: Iterable<string>): OverlapRule[] {
        return firedRules(selection, this.rules);
    }
}
