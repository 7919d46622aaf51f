/**
 * Knowledge Base Model
 *
 * Read-only queries and derived views over one loaded snapshot.
 * The caller owns the instance for its session and passes it to every
 * view; nothing here is shared across sessions.
 */

import type {
    ComparisonModel,
    Construct,
    KnowledgeBaseData,
    LoadResult,
    MeasureRow,
    ModelDimensionTable,
    StrengthLevel,
} from '../types/knowledgeBase.js';
import { DEFAULTS, LoadOptions, MODEL_DIMENSIONS } from '../types/options.js';
import { createNotFound } from '../types/errors.js';
import { KnowledgeBaseLoader } from './loader.js';

export class KnowledgeBase {
    private readonly data: KnowledgeBaseData;
    private readonly constructKeys: readonly string[];
    private readonly modelKeys: readonly string[];

    constructor(data: KnowledgeBaseData) {
        this.data = data;
        this.constructKeys = Object.freeze([...data.constructs.keys()]);
        this.modelKeys = Object.freeze([...data.models.keys()]);
    }

    static fromLoadResult(result: LoadResult): KnowledgeBase {
        return new KnowledgeBase(result.data);
    }

    get schemaVersion(): string | undefined {
        return this.data.schemaVersion;
    }

    // === Constructs ===

    taxonomy(): readonly string[] {
        return this.data.taxonomy;
    }

    /**
     * @throws AtlasException NOT_FOUND
     */
    construct(key: string): Construct {
        const construct = this.data.constructs.get(key);
        if (!construct) {
            throw createNotFound('construct', key);
        }
        return construct;
    }

    allConstructKeys(): readonly string[] {
        return this.constructKeys;
    }

    /**
     * One level per taxonomy dimension, in taxonomy order. Dimensions the
     * construct does not rate are 0.
     */
    componentVector(key: string): StrengthLevel[] {
        const { components } = this.construct(key);
        return this.data.taxonomy.map(dimension => components.get(dimension)?.level ?? 0);
    }

    /**
     * Keys whose label or any synonym contains the query, ignoring case.
     * Only the empty query matches everything; whitespace is matched as
     * written. Order follows allConstructKeys().
     */
    searchConstructs(query: string): string[] {
        if (query === '') {
            return [...this.constructKeys];
        }
        const needle = query.toLowerCase();
        return this.constructKeys.filter(key => {
            const c = this.construct(key);
            return c.label.toLowerCase().includes(needle)
                || c.synonyms.some(s => s.toLowerCase().includes(needle));
        });
    }

    /**
     * Flattened measure table, constructs in the given order, measures in
     * document order within each.
     */
    measureRows(keys: readonly string[]): MeasureRow[] {
        const rows: MeasureRow[] = [];
        for (const key of keys) {
            const c = this.construct(key);
            for (const m of c.measures) {
                rows.push({
                    construct: c.label,
                    measure: m.name,
                    type: m.type,
                    targets: m.targets.join(', '),
                    notes: m.notes,
                });
            }
        }
        return rows;
    }

    // === Models ===

    /**
     * @throws AtlasException NOT_FOUND
     */
    model(key: string): ComparisonModel {
        const model = this.data.models.get(key);
        if (!model) {
            throw createNotFound('model', key);
        }
        return model;
    }

    allModelKeys(): readonly string[] {
        return this.modelKeys;
    }

    /**
     * Model keys in the given domain; "all" returns every model.
     */
    modelsByDomain(domain: string): string[] {
        if (domain === DEFAULTS.allDomains) {
            return [...this.modelKeys];
        }
        return this.modelKeys.filter(key => this.model(key).domain === domain);
    }

    /**
     * Distinct domains in first-seen order.
     */
    domains(): string[] {
        return [...new Set(this.modelKeys.map(key => this.model(key).domain))];
    }

    /**
     * One row per dimension, one value per selected model; the
     * placeholder fills dimensions a model does not describe.
     */
    modelDimensionTable(
        keys: readonly string[],
        dims: readonly string[] = MODEL_DIMENSIONS.map(d => d.key)
    ): ModelDimensionTable {
        if (keys.length === 0) {
            return { models: [], rows: [] };
        }
        const models = keys.map(key => this.model(key));
        return {
            models: models.map(m => ({ key: m.key, label: m.label })),
            rows: dims.map(dimension => ({
                dimension,
                values: models.map(m => m.dimensions.get(dimension) ?? DEFAULTS.placeholder),
            })),
        };
    }
}

/**
 * Load a knowledge base through a fresh loader and wrap it.
 * @throws AtlasException LOAD_FAILURE, PARSE_FAILURE or SCHEMA_INVALID
 */
export function openKnowledgeBase(options: LoadOptions = {}): { kb: KnowledgeBase; result: LoadResult } {
    const result = new KnowledgeBaseLoader(options).load();
    return { kb: KnowledgeBase.fromLoadResult(result), result };
}
