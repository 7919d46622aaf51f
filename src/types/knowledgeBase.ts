/**
 * Knowledge base record types.
 *
 * Every record is normalized at load time, so optional YAML fields
 * already carry their defaults here.
 */

/** Resolved component strength used for charting */
export type StrengthLevel = 0 | 1 | 2 | 3;

export interface ComponentRating {
    level: StrengthLevel;
    /** Original label when the strength was written as text */
    label?: string;
}

export interface Intervention {
    name: string;
    targetComponents: readonly string[];
    strength: string;
}

export interface Measure {
    name: string;
    type: string;
    targets: readonly string[];
    notes: string;
    citation: string;
}

export interface Construct {
    key: string;
    label: string;
    synonyms: readonly string[];
    definition: string;
    /** Document order is kept for display */
    components: ReadonlyMap<string, ComponentRating>;
    theories: readonly string[];
    mechanisms: readonly string[];
    exemplarOutcomes: readonly string[];
    interventions: readonly Intervention[];
    measures: readonly Measure[];
    citations: readonly string[];
    notes?: string;
}

export interface ComparisonModel {
    key: string;
    label: string;
    domain: string;
    dimensions: ReadonlyMap<string, string>;
    keyPapers: readonly string[];
}

export interface KnowledgeBaseData {
    schemaVersion?: string;
    taxonomy: readonly string[];
    constructs: ReadonlyMap<string, Construct>;
    models: ReadonlyMap<string, ComparisonModel>;
}

export type NoticeKind =
    | 'DEFAULT_TAXONOMY'
    | 'NO_MODELS'
    | 'UNKNOWN_COMPONENT'
    | 'UNRESOLVED_STRENGTH'
    | 'DROPPED_ITEM';

/**
 * Non-fatal condition found while loading
 */
export interface LoadNotice {
    kind: NoticeKind;
    message: string;
    key?: string;
}

export interface LoadResult {
    /** Path the document was read from */
    source: string;
    /** Every candidate path considered, in order */
    tried: readonly string[];
    data: KnowledgeBaseData;
    notices: readonly LoadNotice[];
}

// === Derived views ===

export interface MeasureRow {
    construct: string;
    measure: string;
    type: string;
    targets: string;
    notes: string;
}

export interface ModelDimensionRow {
    dimension: string;
    values: string[];
}

export interface ModelDimensionTable {
    models: Array<{ key: string; label: string }>;
    rows: ModelDimensionRow[];
}
