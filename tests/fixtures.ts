/**
 * Shared test fixtures for knowledge base tests.
 */
import * as fs from 'fs';
import * as path from 'path';
import { parseKnowledgeBase } from '../src/kb/loader.js';
import { KnowledgeBase } from '../src/kb/model.js';
import { AtlasException } from '../src/types/errors.js';
import type { LoadResult } from '../src/types/knowledgeBase.js';

export const FIXTURE_DIR = path.join(__dirname, 'fixtures');

export function fixturePath(name: string): string {
    return path.join(FIXTURE_DIR, name);
}

export function loadFixture(name: string): LoadResult {
    const file = fixturePath(name);
    return parseKnowledgeBase(fs.readFileSync(file, 'utf-8'), file);
}

export function fixtureKb(name = 'atlas.yaml'): KnowledgeBase {
    return KnowledgeBase.fromLoadResult(loadFixture(name));
}

/**
 * Error code thrown by fn, or undefined when it does not throw.
 */
export function errorCodeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (e) {
        if (e instanceof AtlasException) {
            return e.code;
        }
        throw e;
    }
    return undefined;
}
