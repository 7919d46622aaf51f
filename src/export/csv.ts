/**
 * CSV export of the model comparison table.
 */

import Papa from 'papaparse';
import type { ModelDimensionTable } from '../types/knowledgeBase.js';
import { MODEL_DIMENSIONS } from '../types/options.js';

export const DIMENSION_COLUMN = 'Dimension';

export function dimensionLabel(name: string): string {
    return MODEL_DIMENSIONS.find(d => d.key === name)?.label ?? name;
}

/**
 * Header is the dimension column plus one column per model label.
 * An empty table produces an empty string.
 */
export function modelTableToCsv(table: ModelDimensionTable): string {
    if (table.models.length === 0) {
        return '';
    }
    const header = [DIMENSION_COLUMN, ...table.models.map(m => m.label)];
    const rows = table.rows.map(row => [dimensionLabel(row.dimension), ...row.values]);
    return Papa.unparse([header, ...rows], { newline: '\n' });
}

export interface ParsedCsvTable {
    header: string[];
    rows: string[][];
}

export function parseModelTableCsv(text: string): ParsedCsvTable {
    const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });
    const [header = [], ...rows] = parsed.data;
    return { header, rows };
}
