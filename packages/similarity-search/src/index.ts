/**
 * similarity-search
 *
 * Similar-listing retrieval over separate location, feature and visual
 * vector indexes, fused with weighted Reciprocal Rank Fusion and narrowed
 * by structured post-filters.
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./diagnostics";
export * from "./query";
export * from "./storage";
