import * as path from 'path';
import { DEFAULTS } from './types/options.js';
import type { CandidatePathOptions } from './types/options.js';

/** Package root: one level above src/ (or dist/) */
export const APP_DIR = path.resolve(__dirname, '..');

export interface AtlasConfig extends CandidatePathOptions {
    fileName: string;
    appDir: string;
    cwd: string;
}

/**
 * Resolve where to look for the knowledge base.
 * CONSTRUCT_ATLAS_FILE names an explicit document; CONSTRUCT_ATLAS_FILENAME
 * changes the file name looked up in the standard locations.
 */
export function resolveConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<AtlasConfig> = {}
): AtlasConfig {
    const explicitPath = overrides.explicitPath ?? (env.CONSTRUCT_ATLAS_FILE || undefined);
    return {
        fileName: overrides.fileName ?? (env.CONSTRUCT_ATLAS_FILENAME || DEFAULTS.fileName),
        appDir: overrides.appDir ?? APP_DIR,
        cwd: overrides.cwd ?? process.cwd(),
        ...(explicitPath ? { explicitPath } : {}),
    };
}
