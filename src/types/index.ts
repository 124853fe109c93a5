/**
 * Barrel export for all shared types.
 */
export type {
    RecordSnapshot,
    StoreRow,
    ScreeningStatus,
    Annotations,
    AnnotationValue,
} from './record.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    LitSyncConfig,
    LogLevel,
    ScopusConfig,
    ScopusView,
    ClassifierConfig,
} from './config.js';
export type {
    Window,
    CapPolicy,
    SearchOptions,
    SearchResult,
    SearchSource,
    Slice,
    SliceOutcome,
    FetchReport,
} from './search.js';
export type { Classifier } from './classifier.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
