import type { LoadNotice } from './knowledgeBase.js';

export interface LoadOptions {
    /** Paths tried in order; the first existing one is used */
    candidates?: string[];
    /**
     * Callback for non-fatal load conditions.
     * @param notice The condition, also kept on the load result.
     */
    onNotice?: (notice: LoadNotice) => void;
}

export interface CandidatePathOptions {
    fileName?: string;
    /** Directory the application lives in */
    appDir?: string;
    cwd?: string;
    /** Explicit path tried before the standard locations */
    explicitPath?: string;
}

export const DEFAULTS = {
    fileName: 'constructs.yaml',
    dataDir: 'data',
    placeholder: '—',
    allDomains: 'all',
    modelDomain: 'general',
    maxLevel: 3,
} as const;

export const DEFAULT_TAXONOMY: readonly string[] = Object.freeze([
    'inhibition',
    'working memory',
    'shifting',
    'goal setting',
    'monitoring',
    'delay of gratification',
    'emotion regulation',
    'motivation',
]);

export const STRENGTH_LEVELS: ReadonlyMap<string, 1 | 2 | 3> = new Map<string, 1 | 2 | 3>([
    ['low', 1],
    ['medium', 2],
    ['strong', 3],
]);

/** Fixed comparison dimensions, in table order */
export const MODEL_DIMENSIONS: ReadonlyArray<{ key: string; label: string }> = [
    { key: 'level_of_analysis', label: 'Level of analysis' },
    { key: 'conflict', label: 'Conflict' },
    { key: 'emotion_role', label: 'Emotion role' },
    { key: 'cognitive_function', label: 'Cognitive function' },
];

export const DEFAULT_SELECTION: readonly string[] = [
    'self-control',
    'self-regulation',
    'executive-function',
];
