export {
  PipelineStorage,
  chunkFileName,
  summaryKeyForChunkFile,
  naturalCompare,
  COMBINED_FILE_NAME,
  OPTIMIZED_DIR_NAME,
  type StoragePaths,
  type StoredChunk,
  type StoredSummary,
} from './pipeline-storage.js';
