import type { KnowledgeBase } from '../kb/model.js';
import { DEFAULTS } from '../types/options.js';

export interface RadarSeries {
    key: string;
    name: string;
    /** Levels with the first point repeated to close the polygon */
    r: number[];
    theta: string[];
}

export const RADAR_RANGE: readonly [number, number] = [0, DEFAULTS.maxLevel];

/**
 * Chart-ready series for the selected constructs, axes in taxonomy order.
 */
export function radarSeries(kb: KnowledgeBase, keys: readonly string[]): RadarSeries[] {
    const axes = kb.taxonomy();
    return keys.map(key => {
        const vector: number[] = kb.componentVector(key);
        return {
            key,
            name: kb.construct(key).label,
            r: vector.length > 0 ? [...vector, vector[0]] : [],
            theta: axes.length > 0 ? [...axes, axes[0]] : [],
        };
    });
}
