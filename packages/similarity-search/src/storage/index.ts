/**
 * Storage module exports
 */

export { createMemoryFacetStore, cosineSimilarity, type MemoryFacetStore } from "./memory-facet-store";
