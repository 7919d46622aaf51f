/**
 * Tests for model table CSV export
 */

import { dimensionLabel, modelTableToCsv, parseModelTableCsv } from '../src/export/csv.js';
import type { ModelDimensionTable } from '../src/types/knowledgeBase.js';
import { fixtureKb } from './fixtures.js';

describe('modelTableToCsv', () => {
    const kb = fixtureKb();

    test('writes a header of dimension plus model labels', () => {
        const csv = modelTableToCsv(kb.modelDimensionTable(['cyclical-srl', 'dual-systems']));
        const lines = csv.split('\n');

        expect(lines[0]).toBe('Dimension,Cyclical SRL,dual-systems');
        expect(lines[1]).toBe('Level of analysis,learner,—');
        expect(lines[4]).toBe('Cognitive function,"planning, monitoring",—');
        expect(lines).toHaveLength(5);
    });

    test('empty table exports nothing', () => {
        expect(modelTableToCsv(kb.modelDimensionTable([]))).toBe('');
    });

    test('round-trips the table values', () => {
        const table = kb.modelDimensionTable(['strength-model', 'cyclical-srl', 'dual-systems']);
        const parsed = parseModelTableCsv(modelTableToCsv(table));

        expect(parsed.header).toEqual(['Dimension', 'Strength Model', 'Cyclical SRL', 'dual-systems']);
        expect(parsed.rows.map(r => r.slice(1))).toEqual(table.rows.map(r => r.values));
        expect(parsed.rows.map(r => r[0])).toEqual(table.rows.map(r => dimensionLabel(r.dimension)));
    });

    test('quotes survive the round trip', () => {
        const table: ModelDimensionTable = {
            models: [{ key: 'q', label: 'Quoted "model"' }],
            rows: [{ dimension: 'conflict', values: ['say "no", then wait'] }],
        };
        const parsed = parseModelTableCsv(modelTableToCsv(table));

        expect(parsed.header).toEqual(['Dimension', 'Quoted "model"']);
        expect(parsed.rows).toEqual([['Conflict', 'say "no", then wait']]);
    });
});

describe('dimensionLabel', () => {
    test('maps known dimensions and passes others through', () => {
        expect(dimensionLabel('emotion_role')).toBe('Emotion role');
        expect(dimensionLabel('custom_axis')).toBe('custom_axis');
    });
});
