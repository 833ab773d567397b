export { documents } from "./documents.js";
export { chunks, chunkLinks } from "./chunks.js";
export { entities, chunkMentions, entityRelations } from "./knowledge.js";
export { vector, toVectorLiteral, parseVectorLiteral } from "./vector.js";
