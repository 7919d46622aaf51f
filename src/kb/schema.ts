/**
 * Record normalization for the knowledge base document.
 *
 * The YAML is hand-authored, so fields may be absent, mistyped or
 * oddly cased. Each record goes through these schemas exactly once;
 * everything downstream works with the typed records.
 */

import { z } from 'zod';
import type {
    ComparisonModel,
    ComponentRating,
    Construct,
    Intervention,
    LoadNotice,
    Measure,
} from '../types/knowledgeBase.js';
import { DEFAULTS } from '../types/options.js';
import { isResolvableStrength, toRating } from './strength.js';

export type NoticeSink = (notice: LoadNotice) => void;

const scalar = z.union([z.string(), z.number()]).transform(v => String(v));

const text = (fallback = '') => scalar.catch(fallback);

const optionalText = scalar.optional().catch(undefined);

const textList = z
    .array(z.unknown())
    .catch([])
    .transform(items =>
        items.flatMap(item => {
            if (typeof item === 'string') return [item];
            if (typeof item === 'number') return [String(item)];
            return [];
        })
    );

const mapping = z.record(z.string(), z.unknown());

const itemList = z.array(z.unknown()).catch([]);

export const interventionSchema = z.object({
    name: text(),
    target_components: textList,
    strength: text(),
});

export const measureSchema = z.object({
    name: text(),
    type: text(),
    targets: textList,
    notes: text(),
    citation: text(),
});

export const constructSchema = z.object({
    label: optionalText,
    synonyms: textList,
    definition: text(),
    components: mapping.catch({}),
    theories: textList,
    mechanisms: textList,
    exemplar_outcomes: textList,
    interventions: itemList,
    measures: itemList,
    citations: textList,
    notes: optionalText,
});

export const modelSchema = z.object({
    label: optionalText,
    domain: text(DEFAULTS.modelDomain),
    dimensions: mapping.catch({}),
    key_papers: textList,
});

export function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps the items that parse and carry a name; reports the rest.
 */
function namedItems<T extends { name: string }>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    items: unknown[],
    owner: string,
    field: string,
    notify: NoticeSink
): T[] {
    const kept: T[] = [];
    items.forEach((item, index) => {
        const parsed = schema.safeParse(item);
        if (parsed.success && parsed.data.name.trim() !== '') {
            kept.push(parsed.data);
        } else {
            notify({
                kind: 'DROPPED_ITEM',
                key: owner,
                message: `Dropped ${field}[${index}] of '${owner}': not a record with a name`,
            });
        }
    });
    return kept;
}

function normalizeComponents(
    key: string,
    raw: Record<string, unknown>,
    taxonomy: ReadonlySet<string>,
    notify: NoticeSink
): Map<string, ComponentRating> {
    const components = new Map<string, ComponentRating>();
    for (const [dimension, value] of Object.entries(raw)) {
        if (!taxonomy.has(dimension)) {
            notify({
                kind: 'UNKNOWN_COMPONENT',
                key,
                message: `Component '${dimension}' of '${key}' is not in the taxonomy`,
            });
        }
        if (!isResolvableStrength(value)) {
            notify({
                kind: 'UNRESOLVED_STRENGTH',
                key,
                message: `Strength ${String(value)} for '${dimension}' of '${key}' resolves to 0`,
            });
        }
        components.set(dimension, toRating(value));
    }
    return components;
}

/**
 * Normalize one construct entry. Returns undefined when the entry is
 * not a mapping at all.
 */
export function normalizeConstruct(
    key: string,
    raw: unknown,
    taxonomy: readonly string[],
    notify: NoticeSink
): Construct | undefined {
    const parsed = constructSchema.safeParse(raw);
    if (!parsed.success) {
        return undefined;
    }
    const c = parsed.data;

    const interventions: Intervention[] = namedItems(interventionSchema, c.interventions, key, 'interventions', notify)
        .map(iv => ({
            name: iv.name,
            targetComponents: iv.target_components,
            strength: iv.strength,
        }));

    const measures: Measure[] = namedItems(measureSchema, c.measures, key, 'measures', notify);

    return Object.freeze({
        key,
        label: c.label ?? key,
        synonyms: c.synonyms,
        definition: c.definition,
        components: normalizeComponents(key, c.components, new Set(taxonomy), notify),
        theories: c.theories,
        mechanisms: c.mechanisms,
        exemplarOutcomes: c.exemplar_outcomes,
        interventions,
        measures,
        citations: c.citations,
        ...(c.notes !== undefined && c.notes.trim() !== '' && { notes: c.notes }),
    });
}

/**
 * Normalize one comparison model entry. Returns undefined when the
 * entry is not a mapping.
 */
export function normalizeModel(
    key: string,
    raw: unknown,
    notify: NoticeSink
): ComparisonModel | undefined {
    const parsed = modelSchema.safeParse(raw);
    if (!parsed.success) {
        return undefined;
    }
    const m = parsed.data;

    const dimensions = new Map<string, string>();
    for (const [name, value] of Object.entries(m.dimensions)) {
        const cell = scalar.safeParse(value);
        if (cell.success) {
            dimensions.set(name, cell.data);
        } else if (value !== undefined && value !== null) {
            notify({
                kind: 'DROPPED_ITEM',
                key,
                message: `Dropped dimensions.${name} of '${key}': not text or a number`,
            });
        }
    }

    return Object.freeze({
        key,
        label: m.label ?? key,
        domain: m.domain,
        dimensions,
        keyPapers: m.key_papers,
    });
}
