import { DEFAULT_SELECTION } from '../types/options.js';

/**
 * Preselected constructs, limited to those currently offered.
 */
export function defaultSelection(candidates: readonly string[]): string[] {
    const offered = new Set(candidates);
    return DEFAULT_SELECTION.filter(key => offered.has(key));
}

/**
 * Splits requested keys into known and unknown ones, keeping order and
 * dropping repeats.
 */
export function partitionKeys(
    requested: readonly string[],
    known: readonly string[]
): { valid: string[]; unknown: string[] } {
    const knownSet = new Set(known);
    const valid: string[] = [];
    const unknown: string[] = [];
    for (const key of new Set(requested)) {
        (knownSet.has(key) ? valid : unknown).push(key);
    }
    return { valid, unknown };
}
