export { splitSpans, chunkDocument } from "./chunker.js";
export { CorpusStore, contentHash, type RegisterResult } from "./corpus-store.js";
export {
  HashingEmbedder,
  GeminiEmbedder,
  createEmbedder,
  normalize,
  type Embedder,
} from "./embedders.js";
export { VectorIndex, cosine, dot, type IndexEntry, type SearchHit, type SimilarityMetric } from "./vector-index.js";
export { IndexRegistry, type IndexSnapshot } from "./index-registry.js";
export { Retriever, selectHits, retrievalConfidence, type RetrieverOptions } from "./retriever.js";
export { KnowledgeBase, type IngestReport, type KnowledgeBaseConfig } from "./knowledge-base.js";
export { collectSourceFiles, ingestPaths } from "./ingest.js";
export { loadSourceFile, decodeText, validateText, mediaTypeFor, type LoadedSource } from "./loaders.js";
export { saveIndex, loadKnowledgeBase, type PersistedIndex } from "./persistence.js";
