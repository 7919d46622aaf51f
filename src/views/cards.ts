/**
 * Card projection of a construct: the text a presentation layer shows
 * for one selected entry.
 */

import type { KnowledgeBase } from '../kb/model.js';

export interface ConstructCard {
    key: string;
    title: string;
    /** Synonyms joined for a caption line */
    caption: string;
    definition: string;
    components: string[];
    theories?: string;
    mechanisms?: string;
    interventions: string[];
    outcomes?: string;
    notes?: string;
}

function joined(items: readonly string[], separator: string): string | undefined {
    return items.length > 0 ? items.join(separator) : undefined;
}

/**
 * Chips read "dimension (label)" when the strength was written as a
 * label, otherwise just the dimension.
 */
export function componentChips(kb: KnowledgeBase, key: string): string[] {
    const chips: string[] = [];
    for (const [dimension, rating] of kb.construct(key).components) {
        chips.push(rating.label !== undefined ? `${dimension} (${rating.label})` : dimension);
    }
    return chips;
}

export function constructCard(kb: KnowledgeBase, key: string): ConstructCard {
    const c = kb.construct(key);
    const card: ConstructCard = {
        key,
        title: c.label,
        caption: c.synonyms.join(', '),
        definition: c.definition,
        components: componentChips(kb, key),
        interventions: c.interventions.map(iv =>
            `${iv.name} → ${iv.targetComponents.join(', ')} (${iv.strength})`),
    };

    const theories = joined(c.theories, '; ');
    if (theories) card.theories = theories;
    const mechanisms = joined(c.mechanisms, '; ');
    if (mechanisms) card.mechanisms = mechanisms;
    const outcomes = joined(c.exemplarOutcomes, ', ');
    if (outcomes) card.outcomes = outcomes;
    if (c.notes) card.notes = c.notes;

    return card;
}
