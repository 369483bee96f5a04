export { FileArtifactStore, writeJsonFile } from './file-artifact-store.js';
export { MemoryArtifactStore } from './memory-artifact-store.js';
export { FileFeedbackStore } from './file-feedback-store.js';
export { MemoryFeedbackStore } from './memory-feedback-store.js';
export { artifactSchemas, feedbackEntrySchema } from './artifact-schemas.js';
