// Core exports
export * from './core/ast/index.js';
export * from './core/semantic/index.js';
export { walkFiles, shouldExclude, DEFAULT_EXCLUDES, DEFAULT_EXTENSIONS, type WalkResult, type WalkOutcome, type WalkOptions } from './core/walker.js';
export {
  AnalysisError,
  ParseError,
  EncodingError,
  SizeLimitExceededError,
  FileAccessError,
  InvalidRootError,
  EntityValidationError,
  IndexFormatError,
  errorMessage,
  type AnalysisErrorCode,
} from './core/errors.js';
export {
  createLogger,
  silentLogger,
  MemoryLogger,
  LOG_LEVELS,
  isLogLevel,
  resolveLogLevel,
  type Logger,
  type LogLevel,
  type LogFields,
  type LoggerOptions,
} from './core/logger.js';
export { createChunks, estimateTokens, EMPTY_ANALYSIS_TEXT, type Chunk, type ChunkKind } from './core/chunker.js';
export {
  answerQuery,
  indexChunks,
  indexFileAnalyses,
  cosineSimilarity,
  MemoryVectorStore,
  DEFAULT_TOP_K,
  NO_RELEVANT_CODE_MESSAGE,
  type ChunkProducer,
  type EmbeddingGenerator,
  type VectorStore,
  type AnswerGenerator,
  type RetrievedChunk,
  type RagDeps,
} from './core/rag.js';

// Storage exports
export {
  loadConfig,
  saveConfig,
  getConfigValue,
  setConfigValue,
  DEFAULT_CONFIG,
  type CodeloreConfig,
} from './storage/config.js';
export { saveProjectAnalysis, loadProjectAnalysis, saveSemanticIndex, loadSemanticIndex } from './storage/index-store.js';
