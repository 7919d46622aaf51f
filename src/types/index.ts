/**
 * Shared type definitions for Construct Atlas
 */

// Re-export error types
export {
    AtlasException,
    createLoadFailure,
    createParseFailure,
    createSchemaInvalid,
    createNotFound,
    serializeAtlasError,
    isAtlasException,
} from './errors.js';

export type {
    AtlasErrorCode,
    AtlasError,
    SourcePosition,
} from './errors.js';

// Knowledge base records and derived views
export type {
    StrengthLevel,
    ComponentRating,
    Intervention,
    Measure,
    Construct,
    ComparisonModel,
    KnowledgeBaseData,
    NoticeKind,
    LoadNotice,
    LoadResult,
    MeasureRow,
    ModelDimensionRow,
    ModelDimensionTable,
} from './knowledgeBase.js';

// Options and constants
export type { LoadOptions, CandidatePathOptions } from './options.js';
export {
    DEFAULTS,
    DEFAULT_TAXONOMY,
    STRENGTH_LEVELS,
    MODEL_DIMENSIONS,
    DEFAULT_SELECTION,
} from './options.js';
