export { ingest, ingestFile, utf8TextExtractor } from "./ingestion-pipeline.js";
export type { IngestionDependencies, TextExtractor } from "./ingestion-pipeline.js";

export { Retriever, DEFAULT_TOP_K } from "./retriever.js";
export type { RetrieverDependencies } from "./retriever.js";

export {
  KnowledgeExtractor,
  selectSample,
  FALLBACK_SCHEMA,
  DEFAULT_SAMPLE_LENGTH,
  MIN_SAMPLE_LENGTH,
  MAX_SAMPLE_LENGTH,
} from "./knowledge-extractor.js";
export type { SampleOptions, TextGenerator, ExtractionCallOptions } from "./knowledge-extractor.js";

export { createKnowledgeBase } from "./knowledge-base.js";
export type { KnowledgeBase, KnowledgeBaseOptions } from "./knowledge-base.js";
