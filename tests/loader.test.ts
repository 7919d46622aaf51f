/**
 * Tests for the knowledge base loader
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { KnowledgeBaseLoader, defaultCandidatePaths, parseKnowledgeBase } from '../src/kb/loader.js';
import { AtlasException } from '../src/types/errors.js';
import type { LoadNotice } from '../src/types/knowledgeBase.js';
import { DEFAULT_TAXONOMY } from '../src/types/options.js';
import { errorCodeOf, fixturePath, loadFixture } from './fixtures.js';

describe('defaultCandidatePaths', () => {
    test('orders app dir, working dir, then data/', () => {
        expect(defaultCandidatePaths({ appDir: '/app', cwd: '/work' })).toEqual([
            '/app/constructs.yaml',
            '/work/constructs.yaml',
            '/work/data/constructs.yaml',
        ]);
    });

    test('explicit path comes first, resolved against cwd', () => {
        const paths = defaultCandidatePaths({ cwd: '/work', explicitPath: 'kb/atlas.yaml' });
        expect(paths[0]).toBe('/work/kb/atlas.yaml');
        expect(paths).toHaveLength(3);
    });

    test('drops duplicate when app dir is the working dir', () => {
        expect(defaultCandidatePaths({ appDir: '/work', cwd: '/work', fileName: 'kb.yml' })).toEqual([
            '/work/kb.yml',
            '/work/data/kb.yml',
        ]);
    });
});

describe('KnowledgeBaseLoader', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'atlas-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function write(relative: string, content: string): string {
        const file = path.join(dir, relative);
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, content);
        return file;
    }

    test('uses the first candidate that exists', () => {
        const dataFile = write('data/constructs.yaml', fs.readFileSync(fixturePath('atlas.yaml'), 'utf-8'));
        const loader = new KnowledgeBaseLoader({
            candidates: [path.join(dir, 'missing.yaml'), path.join(dir, 'constructs.yaml'), dataFile],
        });

        const result = loader.load();

        expect(result.source).toBe(dataFile);
        expect(result.tried).toHaveLength(3);
        expect([...result.data.constructs.keys()]).toEqual(['self-control', 'grit', 'executive-function']);
    });

    test('earlier candidate wins over later ones', () => {
        const first = write('constructs.yaml', 'constructs:\n  a: {label: A}\n');
        const second = write('data/constructs.yaml', 'constructs:\n  b: {label: B}\n');

        const result = new KnowledgeBaseLoader({ candidates: [first, second] }).load();

        expect(result.source).toBe(first);
        expect([...result.data.constructs.keys()]).toEqual(['a']);
    });

    test('skips an existing candidate that is not a mapping', () => {
        const empty = write('constructs.yaml', '');
        const dataFile = write('data/constructs.yaml', 'constructs:\n  a: {label: A}\n');

        const result = new KnowledgeBaseLoader({ candidates: [empty, dataFile] }).load();

        expect(result.source).toBe(dataFile);
        expect(result.tried).toEqual([empty, dataFile]);
        expect([...result.data.constructs.keys()]).toEqual(['a']);
    });

    test('no mapping at any candidate is a load failure with each reason', () => {
        const list = write('constructs.yaml', '- a\n- b\n');
        const text = write('data/constructs.yaml', 'just text\n');
        const missing = path.join(dir, 'missing.yaml');
        const loader = new KnowledgeBaseLoader({ candidates: [missing, list, text] });

        try {
            loader.load();
            throw new Error('expected load to fail');
        } catch (e) {
            expect(e).toBeInstanceOf(AtlasException);
            const err = (e as AtlasException).error;
            expect(err.code).toBe('LOAD_FAILURE');
            expect(err.message).toBe(
                'No candidate holds a knowledge base mapping. Tried:\n' +
                `  - ${missing}\n` +
                `  - ${list} (top-level document is not a mapping)\n` +
                `  - ${text} (top-level document is not a mapping)`
            );
            expect(err.details).toEqual({
                tried: [missing, list, text],
                rejected: {
                    [list]: 'top-level document is not a mapping',
                    [text]: 'top-level document is not a mapping',
                },
            });
        }
    });

    test('malformed YAML in the chosen candidate is not skipped', () => {
        const broken = write('constructs.yaml', 'constructs: [a\n');
        const dataFile = write('data/constructs.yaml', 'constructs:\n  a: {label: A}\n');

        expect(errorCodeOf(() => new KnowledgeBaseLoader({ candidates: [broken, dataFile] }).load()))
            .toBe('PARSE_FAILURE');
    });

    test('missing constructs in the chosen candidate is schema-invalid', () => {
        const first = write('constructs.yaml', 'models: {}\n');
        const dataFile = write('data/constructs.yaml', 'constructs:\n  a: {label: A}\n');

        expect(errorCodeOf(() => new KnowledgeBaseLoader({ candidates: [first, dataFile] }).load()))
            .toBe('SCHEMA_INVALID');
    });

    test('reads the file once per loader', () => {
        const file = write('constructs.yaml', 'constructs:\n  a: {label: A}\n');
        const loader = new KnowledgeBaseLoader({ candidates: [file] });

        expect(loader.isLoaded()).toBe(false);
        const first = loader.load();
        fs.rmSync(file);

        expect(loader.load()).toBe(first);
        expect(loader.isLoaded()).toBe(true);
    });

    test('separate loaders keep separate snapshots', () => {
        const file = write('constructs.yaml', 'constructs:\n  a: {label: A}\n');
        const first = new KnowledgeBaseLoader({ candidates: [file] }).load();
        fs.writeFileSync(file, 'constructs:\n  b: {label: B}\n');
        const second = new KnowledgeBaseLoader({ candidates: [file] }).load();

        expect([...first.data.constructs.keys()]).toEqual(['a']);
        expect([...second.data.constructs.keys()]).toEqual(['b']);
    });

    test('no existing candidate is a load failure naming every path', () => {
        const candidates = [path.join(dir, 'one.yaml'), path.join(dir, 'two.yaml')];
        const loader = new KnowledgeBaseLoader({ candidates });

        try {
            loader.load();
            throw new Error('expected load to fail');
        } catch (e) {
            expect(e).toBeInstanceOf(AtlasException);
            const err = (e as AtlasException).error;
            expect(err.code).toBe('LOAD_FAILURE');
            expect(err.message).toContain(candidates[0]);
            expect(err.message).toContain(candidates[1]);
            expect(err.details).toEqual({ tried: candidates });
        }
        expect(loader.isLoaded()).toBe(false);
    });

    test('unreadable candidate is a load failure', () => {
        // A directory exists but cannot be read as a file
        const sub = path.join(dir, 'constructs.yaml');
        fs.mkdirSync(sub);

        expect(errorCodeOf(() => new KnowledgeBaseLoader({ candidates: [sub] }).load())).toBe('LOAD_FAILURE');
    });

    test('malformed YAML is a parse failure with a position', () => {
        const loader = new KnowledgeBaseLoader({ candidates: [fixturePath('malformed.yaml')] });

        try {
            loader.load();
            throw new Error('expected load to fail');
        } catch (e) {
            expect(e).toBeInstanceOf(AtlasException);
            const err = (e as AtlasException).error;
            expect(err.code).toBe('PARSE_FAILURE');
            expect(err.context).toBe(fixturePath('malformed.yaml'));
            expect(err.position?.line).toBeGreaterThan(0);
        }
    });

    test('onNotice receives the same notices as the result', () => {
        const seen: LoadNotice[] = [];
        const result = new KnowledgeBaseLoader({
            candidates: [fixturePath('no-taxonomy.yaml')],
            onNotice: n => seen.push(n),
        }).load();

        expect(seen).toEqual(result.notices);
    });
});

describe('parseKnowledgeBase', () => {
    test('document missing constructs is schema-invalid', () => {
        expect(errorCodeOf(() => loadFixture('no-constructs.yaml'))).toBe('SCHEMA_INVALID');
    });

    test('non-mapping document is schema-invalid', () => {
        expect(errorCodeOf(() => parseKnowledgeBase('- a\n- b\n', 'list.yaml'))).toBe('SCHEMA_INVALID');
        expect(errorCodeOf(() => parseKnowledgeBase('', 'empty.yaml'))).toBe('SCHEMA_INVALID');
    });

    test('constructs that is not a mapping is schema-invalid', () => {
        expect(errorCodeOf(() => parseKnowledgeBase('constructs: [a, b]\n', 'kb.yaml'))).toBe('SCHEMA_INVALID');
    });

    test('construct entry that is not a mapping is schema-invalid', () => {
        const run = () => parseKnowledgeBase('constructs:\n  grit: just text\n', 'kb.yaml');
        expect(run).toThrow(/construct 'grit' is not a mapping/);
    });

    test('duplicate keys are a parse failure', () => {
        const doc = 'constructs:\n  grit: {label: A}\n  grit: {label: B}\n';
        expect(errorCodeOf(() => parseKnowledgeBase(doc, 'kb.yaml'))).toBe('PARSE_FAILURE');
    });

    test('missing taxonomy substitutes the default and reports it', () => {
        const result = loadFixture('no-taxonomy.yaml');

        expect(result.data.taxonomy).toEqual(DEFAULT_TAXONOMY);
        expect(result.notices.map(n => n.kind)).toEqual(['DEFAULT_TAXONOMY', 'NO_MODELS']);
    });

    test('taxonomy that is not a list of names falls back to the default', () => {
        const result = parseKnowledgeBase('components_taxonomy: [1, 2]\nconstructs: {}\nmodels: {}\n', 'kb.yaml');

        expect(result.data.taxonomy).toEqual(DEFAULT_TAXONOMY);
        expect(result.notices.map(n => n.kind)).toEqual(['DEFAULT_TAXONOMY']);
    });

    test('models that is not a mapping is an empty collection', () => {
        const result = parseKnowledgeBase('constructs: {}\nmodels: [x]\n', 'kb.yaml');

        expect(result.data.models.size).toBe(0);
        expect(result.notices.map(n => n.kind)).toContain('NO_MODELS');
    });

    test('reports off-taxonomy components, unresolved strengths and dropped items', () => {
        const result = loadFixture('atlas.yaml');

        expect(result.notices.map(n => n.kind)).toEqual([
            'DROPPED_ITEM',
            'UNKNOWN_COMPONENT',
            'UNRESOLVED_STRENGTH',
            'UNRESOLVED_STRENGTH',
            'UNRESOLVED_STRENGTH',
        ]);
        expect(result.notices[1].message).toBe("Component 'creativity' of 'self-control' is not in the taxonomy");
    });

    test('schema version is kept as text', () => {
        expect(loadFixture('atlas.yaml').data.schemaVersion).toBe('2');
        expect(loadFixture('no-taxonomy.yaml').data.schemaVersion).toBeUndefined();
    });
});

describe('record normalization', () => {
    const { data } = loadFixture('atlas.yaml');

    test('label defaults to the key', () => {
        expect(data.constructs.get('grit')?.label).toBe('grit');
        expect(data.models.get('dual-systems')?.label).toBe('dual-systems');
    });

    test('absent fields take empty defaults', () => {
        const ef = data.constructs.get('executive-function');
        expect(ef?.definition).toBe('');
        expect(ef?.theories).toEqual([]);
        expect(ef?.measures).toEqual([]);
        expect(ef?.notes).toBeUndefined();
    });

    test('list items that are not named records are dropped', () => {
        const sc = data.constructs.get('self-control');
        expect(sc?.interventions).toEqual([
            { name: 'Implementation intentions', targetComponents: ['inhibition', 'monitoring'], strength: 'medium' },
        ]);
    });

    test('measures fill missing text fields', () => {
        const sc = data.constructs.get('self-control');
        expect(sc?.measures[1]).toEqual({ name: 'Go/No-Go', type: 'behavioral', targets: [], notes: '', citation: '' });
    });

    test('model domain defaults to general', () => {
        const { data: doc } = parseKnowledgeBase('constructs: {}\nmodels:\n  m: {label: M}\n', 'kb.yaml');
        expect(doc.models.get('m')?.domain).toBe('general');
    });

    test('model dimensions that are not text or a number are dropped and reported', () => {
        const doc = 'constructs: {}\nmodels:\n  m:\n    dimensions:\n      conflict: [a, b]\n      emotion_role: central\n';
        const result = parseKnowledgeBase(doc, 'kb.yaml');

        expect([...(result.data.models.get('m')?.dimensions ?? [])]).toEqual([['emotion_role', 'central']]);
        expect(result.notices.filter(n => n.kind === 'DROPPED_ITEM')).toEqual([
            { kind: 'DROPPED_ITEM', key: 'm', message: "Dropped dimensions.conflict of 'm': not text or a number" },
        ]);
    });

    test('default taxonomy is frozen', () => {
        const { data: doc } = parseKnowledgeBase('constructs: {}\n', 'kb.yaml');
        expect(Object.isFrozen(doc.taxonomy)).toBe(true);
        expect(Object.isFrozen(DEFAULT_TAXONOMY)).toBe(true);
    });

    test('records are frozen', () => {
        const sc = data.constructs.get('self-control');
        expect(Object.isFrozen(sc)).toBe(true);
    });
});
