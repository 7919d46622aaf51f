/**
 * Atlas Session
 *
 * Interaction state for one viewer session: the search text and the
 * current selection. Every change recomputes the view from the shared,
 * read-only knowledge base.
 */

import type { KnowledgeBase } from '../kb/model.js';
import { OverlapAdvisor } from '../advisor/overlap.js';
import type { MeasureRow, ModelDimensionTable } from '../types/knowledgeBase.js';
import { DEFAULTS } from '../types/options.js';
import { constructCard, ConstructCard } from '../views/cards.js';
import { radarSeries, RadarSeries } from '../views/radar.js';
import { defaultSelection, partitionKeys } from '../views/selection.js';

export interface SessionView {
    query: string;
    /** Keys offered for selection after search */
    visible: string[];
    selection: string[];
    warnings: string[];
    cards: ConstructCard[];
    radar: RadarSeries[];
    measures: MeasureRow[];
}

export class AtlasSession {
    private query = '';
    private selection: string[];
    private domain: string = DEFAULTS.allDomains;
    private modelSelection: string[] = [];

    constructor(
        private readonly kb: KnowledgeBase,
        private readonly advisor: OverlapAdvisor = new OverlapAdvisor()
    ) {
        this.selection = defaultSelection(kb.allConstructKeys());
    }

    visible(): string[] {
        return this.kb.searchConstructs(this.query);
    }

    /**
     * Update the search text. Selected keys that no longer match are dropped.
     */
    search(query: string): string[] {
        this.query = query;
        const visible = this.visible();
        const offered = new Set(visible);
        this.selection = this.selection.filter(key => offered.has(key));
        return visible;
    }

    /**
     * Replace the selection. Keys not currently offered are returned and
     * ignored.
     */
    select(keys: readonly string[]): string[] {
        const { valid, unknown } = partitionKeys(keys, this.visible());
        this.selection = valid;
        return unknown;
    }

    getSelection(): readonly string[] {
        return this.selection;
    }

    view(): SessionView {
        const selection = [...this.selection];
        return {
            query: this.query,
            visible: this.visible(),
            selection,
            warnings: this.advisor.warnings(selection),
            cards: selection.map(key => constructCard(this.kb, key)),
            radar: radarSeries(this.kb, selection),
            measures: this.kb.measureRows(selection),
        };
    }

    // === Model comparison ===

    /**
     * Filter models by domain; the model selection keeps only models in it.
     */
    filterDomain(domain: string): string[] {
        this.domain = domain;
        const offered = this.kb.modelsByDomain(domain);
        const inDomain = new Set(offered);
        this.modelSelection = this.modelSelection.filter(key => inDomain.has(key));
        return offered;
    }

    selectModels(keys: readonly string[]): string[] {
        const { valid, unknown } = partitionKeys(keys, this.kb.modelsByDomain(this.domain));
        this.modelSelection = valid;
        return unknown;
    }

    getDomain(): string {
        return this.domain;
    }

    modelTable(): ModelDimensionTable {
        return this.kb.modelDimensionTable(this.modelSelection);
    }
}
