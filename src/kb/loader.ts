/**
 * Knowledge Base Loader
 *
 * Finds the YAML document among candidate paths, parses it and
 * normalizes every record. A loader instance reads its file at most
 * once; later calls return the cached result.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import type {
    ComparisonModel,
    Construct,
    KnowledgeBaseData,
    LoadNotice,
    LoadResult,
} from '../types/knowledgeBase.js';
import {
    CandidatePathOptions,
    DEFAULTS,
    DEFAULT_TAXONOMY,
    LoadOptions,
} from '../types/options.js';
import {
    createLoadFailure,
    createParseFailure,
    createSchemaInvalid,
} from '../types/errors.js';
import { isMapping, normalizeConstruct, normalizeModel } from './schema.js';

/**
 * Standard lookup order: explicit path, beside the application, the
 * working directory root, then data/ under the working directory.
 */
export function defaultCandidatePaths(options: CandidatePathOptions = {}): string[] {
    const fileName = options.fileName ?? DEFAULTS.fileName;
    const cwd = options.cwd ?? process.cwd();
    const candidates: string[] = [];

    if (options.explicitPath) {
        candidates.push(path.resolve(cwd, options.explicitPath));
    }
    if (options.appDir) {
        candidates.push(path.join(options.appDir, fileName));
    }
    candidates.push(path.join(cwd, fileName));
    candidates.push(path.join(cwd, DEFAULTS.dataDir, fileName));

    // Keep first occurrence when appDir and cwd coincide
    return [...new Set(candidates)];
}

function readTaxonomy(raw: unknown, notify: (n: LoadNotice) => void): readonly string[] {
    if (raw === undefined || raw === null) {
        notify({
            kind: 'DEFAULT_TAXONOMY',
            message: 'No components_taxonomy in document; using the default taxonomy',
        });
        return DEFAULT_TAXONOMY;
    }
    if (!Array.isArray(raw) || raw.length === 0 || !raw.every((d): d is string => typeof d === 'string')) {
        notify({
            kind: 'DEFAULT_TAXONOMY',
            message: 'components_taxonomy is not a non-empty list of names; using the default taxonomy',
        });
        return DEFAULT_TAXONOMY;
    }
    return Object.freeze([...raw]);
}

function readSchemaVersion(raw: unknown): string | undefined {
    if (typeof raw === 'string' || typeof raw === 'number') {
        return String(raw);
    }
    return undefined;
}

/**
 * Parse YAML text into a plain document.
 * @throws AtlasException PARSE_FAILURE
 */
function parseDocument(content: string, source: string, tried: readonly string[]): unknown {
    try {
        return parseYaml(content);
    } catch (e) {
        if (e instanceof YAMLParseError) {
            const pos = e.linePos?.[0];
            throw createParseFailure(source, tried, e.message, pos ? { line: pos.line, col: pos.col } : undefined);
        }
        throw createParseFailure(source, tried, (e as Error).message);
    }
}

function toLoadResult(
    document: unknown,
    source: string,
    tried: readonly string[],
    onNotice?: (notice: LoadNotice) => void
): LoadResult {
    const notices: LoadNotice[] = [];
    const notify = (notice: LoadNotice) => {
        notices.push(notice);
        onNotice?.(notice);
    };

    const data = normalizeDocument(document, source, tried, notify);
    return { source, tried, data, notices };
}

/**
 * Parse and normalize a document given as text.
 * @param source Path (or label) the text came from, for diagnostics
 * @param tried Candidate paths reported in errors
 */
export function parseKnowledgeBase(
    content: string,
    source: string,
    tried: readonly string[] = [source],
    onNotice?: (notice: LoadNotice) => void
): LoadResult {
    return toLoadResult(parseDocument(content, source, tried), source, tried, onNotice);
}

function normalizeDocument(
    document: unknown,
    source: string,
    tried: readonly string[],
    notify: (n: LoadNotice) => void
): KnowledgeBaseData {
    if (!isMapping(document)) {
        throw createSchemaInvalid(source, tried, 'top-level document is not a mapping');
    }
    if (!('constructs' in document)) {
        throw createSchemaInvalid(source, tried, 'missing required "constructs" section');
    }
    const rawConstructs = document.constructs;
    if (!isMapping(rawConstructs)) {
        throw createSchemaInvalid(source, tried, '"constructs" is not a mapping');
    }

    const taxonomy = readTaxonomy(document.components_taxonomy, notify);

    const constructs = new Map<string, Construct>();
    for (const [key, raw] of Object.entries(rawConstructs)) {
        const construct = normalizeConstruct(key, raw, taxonomy, notify);
        if (!construct) {
            throw createSchemaInvalid(source, tried, `construct '${key}' is not a mapping`);
        }
        constructs.set(key, construct);
    }

    const models = new Map<string, ComparisonModel>();
    const rawModels = document.models;
    if (rawModels === undefined || rawModels === null) {
        notify({ kind: 'NO_MODELS', message: 'No models section in document; model comparison is empty' });
    } else if (!isMapping(rawModels)) {
        notify({ kind: 'NO_MODELS', message: '"models" is not a mapping; model comparison is empty' });
    } else {
        for (const [key, raw] of Object.entries(rawModels)) {
            const model = normalizeModel(key, raw, notify);
            if (!model) {
                throw createSchemaInvalid(source, tried, `model '${key}' is not a mapping`);
            }
            models.set(key, model);
        }
    }

    return {
        schemaVersion: readSchemaVersion(document.schema_version),
        taxonomy,
        constructs,
        models,
    };
}

export class KnowledgeBaseLoader {
    private readonly candidates: string[];
    private readonly onNotice?: (notice: LoadNotice) => void;
    private cached: LoadResult | null = null;

    constructor(options: LoadOptions = {}) {
        this.candidates = options.candidates ?? defaultCandidatePaths();
        this.onNotice = options.onNotice;
    }

    /**
     * Load (once) and return the normalized knowledge base.
     * @throws AtlasException LOAD_FAILURE, PARSE_FAILURE or SCHEMA_INVALID
     */
    load(): LoadResult {
        if (this.cached) {
            return this.cached;
        }
        this.cached = this.read();
        return this.cached;
    }

    /**
     * True once a load has succeeded.
     */
    isLoaded(): boolean {
        return this.cached !== null;
    }

    /**
     * First candidate that exists and holds a mapping wins. Candidates that
     * are unreadable or hold something else are skipped with a reason.
     */
    private read(): LoadResult {
        const tried = this.candidates;
        const rejected = new Map<string, string>();

        for (const candidate of tried) {
            if (!fs.existsSync(candidate)) {
                continue;
            }

            let content: string;
            try {
                content = fs.readFileSync(candidate, 'utf-8');
            } catch (e) {
                rejected.set(candidate, `unreadable: ${(e as Error).message}`);
                continue;
            }

            const document = parseDocument(content, candidate, tried);
            if (!isMapping(document)) {
                rejected.set(candidate, 'top-level document is not a mapping');
                continue;
            }
            return toLoadResult(document, candidate, tried, this.onNotice);
        }

        if (rejected.size > 0) {
            throw createLoadFailure(tried, 'No candidate holds a knowledge base mapping', undefined, rejected);
        }
        throw createLoadFailure(tried);
    }
}
