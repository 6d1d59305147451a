export { OpenAiEmbeddingService, type EmbeddingService } from './embeddings';
export {
  buildIndex,
  queryIndex,
  rankSegments,
  cosineSimilarity,
  type RetrievalIndex,
} from './vector-index';
