export type { IChunker } from "./chunker.interface.js";
export { CharacterChunker, DEFAULT_CHUNKING, validateChunkingConfig } from "./character-chunker.js";
