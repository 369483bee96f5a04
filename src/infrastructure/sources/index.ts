export { FileLogSource, recordsFromJson } from './file-log-source.js';
export { SearchIndexLogSource, ensureRecentRange } from './search-index-log-source.js';
