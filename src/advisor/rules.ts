/**
 * Known construct-confound pitfalls.
 *
 * Each rule fires when both keys of its pair are selected. Messages are
 * emitted in the order rules appear here.
 */

export type OverlapKind = 'jingle' | 'jangle';

export interface OverlapRule {
    pair: readonly [string, string];
    kind: OverlapKind;
    message: string;
}

export const OVERLAP_RULES: readonly OverlapRule[] = [
    {
        pair: ['self-control', 'grit'],
        kind: 'jangle',
        message: 'Jangle risk: Self-control and Grit often correlate and share self-report items.',
    },
    {
        pair: ['self-control', 'self-regulation'],
        kind: 'jingle',
        message: 'Jingle risk: Self-control (trait/impulse conflict) vs. Self-regulation (SRL process). Check definitions & measures.',
    },
    {
        pair: ['executive-function', 'self-control'],
        kind: 'jangle',
        message: 'Jangle risk: EF tasks are sometimes used as proxies for Self-control; construct scopes differ.',
    },
];
