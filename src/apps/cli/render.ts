/**
 * Plain-text renderings used by the CLI. Colour is applied by the caller.
 */

import type { KnowledgeBase } from '../../kb/model.js';
import type { MeasureRow, ModelDimensionTable } from '../../types/knowledgeBase.js';
import type { ConstructCard } from '../../views/cards.js';
import { dimensionLabel, DIMENSION_COLUMN } from '../../export/csv.js';
import { formatNumbered, formatTable } from '../../utils/formatting.js';

export const MEASURE_COLUMNS = ['Construct', 'Measure', 'Type', 'Targets', 'Notes'] as const;

export function renderTaxonomy(kb: KnowledgeBase): string {
    return formatNumbered(kb.taxonomy());
}

export function renderConstructList(kb: KnowledgeBase, keys: readonly string[]): string {
    if (keys.length === 0) {
        return 'No constructs match.';
    }
    return keys.map(key => {
        const c = kb.construct(key);
        const aka = c.synonyms.length > 0 ? ` (${c.synonyms.join(', ')})` : '';
        return `${key} - ${c.label}${aka}`;
    }).join('\n');
}

export function renderCard(card: ConstructCard): string {
    const lines: string[] = [card.title];
    if (card.caption) lines.push(card.caption);
    lines.push('');
    lines.push(`Definition: ${card.definition}`);
    lines.push(`Key components: ${card.components.join(', ')}`);
    if (card.theories) lines.push(`Theories: ${card.theories}`);
    if (card.mechanisms) lines.push(`Mechanisms: ${card.mechanisms}`);
    if (card.interventions.length > 0) {
        lines.push('Interventions:');
        for (const iv of card.interventions) lines.push(`• ${iv}`);
    }
    if (card.outcomes) lines.push(`Outcomes: ${card.outcomes}`);
    if (card.notes) lines.push(`Notes: ${card.notes}`);
    return lines.join('\n');
}

/**
 * Component levels per construct, one column per taxonomy dimension.
 */
export function renderVectorTable(kb: KnowledgeBase, keys: readonly string[]): string {
    const header = ['Construct', ...kb.taxonomy()];
    const rows = keys.map(key => [kb.construct(key).label, ...kb.componentVector(key).map(String)]);
    return formatTable(header, rows);
}

export function renderMeasures(rows: readonly MeasureRow[]): string {
    if (rows.length === 0) {
        return 'No measures recorded.';
    }
    return formatTable(
        MEASURE_COLUMNS,
        rows.map(r => [r.construct, r.measure, r.type, r.targets, r.notes])
    );
}

export function renderModelList(kb: KnowledgeBase, keys: readonly string[]): string {
    if (keys.length === 0) {
        return 'No models in this domain.';
    }
    return keys.map(key => {
        const m = kb.model(key);
        return `${key} - ${m.label} [${m.domain}]`;
    }).join('\n');
}

export function renderModelTable(table: ModelDimensionTable): string {
    if (table.models.length === 0) {
        return 'No models selected.';
    }
    return formatTable(
        [DIMENSION_COLUMN, ...table.models.map(m => m.label)],
        table.rows.map(row => [dimensionLabel(row.dimension), ...row.values])
    );
}
