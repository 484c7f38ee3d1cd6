// Types
export { TaskStatus, TaskStatusMarker, statusFromMarker, statusFromWord } from './types/task-status.js';
export { NO_PRIORITY } from './types/priority.js';
export type { Priority } from './types/priority.js';
export type { TaskId, IsoDate, RepeatRule, Task } from './types/task.js';
export type { DataResult } from './types/results.js';
export { isError } from './types/results.js';

// Errors
export { TaskSyncError, GrammarMismatchError, StoreRecordMalformedError } from './errors.js';

// Configuration
export { DEFAULT_INDENT_WIDTH, getDefaultStorePath, getIndentWidth } from './config.js';

// Parsers
export {
  parseDate, formatDate, isIsoDate,
  parseLine, stripListMarker, scanExplicitId,
  parseDocument, collectExplicitIds, indentDepth,
  IdAllocator,
} from './parsers/index.js';
export type { LineParseOptions, ParsedLine, DocumentParseOptions, TaskLine } from './parsers/index.js';

// Formatter
export { formatDocument, formatTaskLine } from './format/markdown-formatter.js';
export type { FormatOptions } from './format/markdown-formatter.js';

// Merge
export { mergeTasks } from './merge/merge-engine.js';
export type { MergeOptions, MergeResult } from './merge/merge-engine.js';

// Store
export { TaskStore, decodeStore, decodeRecord, encodeStore } from './store/task-store.js';
export type { TaskRecord } from './store/record-schema.js';

// Sync operations
export {
  DocumentFormat, parseFormat,
  convertDocument, formatMarkdown, applyMarkdown,
} from './sync/sync-service.js';
export type { SyncOptions, ApplyOptions, ApplyOutcome } from './sync/sync-service.js';
