import type { ComponentRating, StrengthLevel } from '../types/knowledgeBase.js';
import { DEFAULTS, STRENGTH_LEVELS } from '../types/options.js';

function isLevel(n: number): n is StrengthLevel {
    return Number.isInteger(n) && n >= 0 && n <= DEFAULTS.maxLevel;
}

/**
 * Resolve a raw component strength to a chart level.
 * Text is looked up case-insensitively as low/medium/strong; a number
 * passes through when it is an integer in [0, 3]. Anything else is 0.
 */
export function resolveStrength(value: unknown): StrengthLevel {
    if (typeof value === 'string') {
        return STRENGTH_LEVELS.get(value.trim().toLowerCase()) ?? 0;
    }
    if (typeof value === 'number' && isLevel(value)) {
        return value;
    }
    return 0;
}

/**
 * True when the value resolves to a level without falling back to 0.
 * An explicit 0 counts as resolved.
 */
export function isResolvableStrength(value: unknown): boolean {
    if (typeof value === 'string') {
        return STRENGTH_LEVELS.has(value.trim().toLowerCase());
    }
    return typeof value === 'number' && isLevel(value);
}

export function toRating(value: unknown): ComponentRating {
    const level = resolveStrength(value);
    return typeof value === 'string' ? { level, label: value } : { level };
}
