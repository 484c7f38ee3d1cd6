export { parseDate, formatDate, isIsoDate } from './date-parser.js';
export { parseLine, stripListMarker, scanExplicitId } from './line-parser.js';
export type { LineParseOptions, ParsedLine } from './line-parser.js';
export { parseDocument, collectExplicitIds, indentDepth } from './document-parser.js';
export type { DocumentParseOptions, TaskLine } from './document-parser.js';
export { IdAllocator } from './id-allocator.js';
