/**
 * Core types for the similarity-search package
 */

// ============================================================================
// Identity & Facets
// ============================================================================

/** Listing identifier, stable across every facet index */
export type EntityId = string | number;

/** Facets are searched and fused in this order */
export const FACETS = ["location", "features", "visual"] as const;

export type Facet = (typeof FACETS)[number];

export function isFacet(value: string): value is Facet {
	return (FACETS as readonly string[]).includes(value);
}

// ============================================================================
// Rankings
// ============================================================================

export interface ScoredNeighbor {
	id: EntityId;
	/** Facet-local similarity; never compared across facets */
	score: number;
}

/** Neighbors ordered by descending similarity. Rank is the 0-based position. */
export type RankedList = ScoredNeighbor[];

export type PerFacetRankings = Partial<Record<Facet, RankedList>>;

/** Facet → weight in [0, 1]. Weights are used as given, not normalized. */
export type WeightProfile = Readonly<Partial<Record<Facet, number>>>;

export interface FusedResult {
	id: EntityId;
	/** Sum of weighted RRF contributions (higher is better) */
	score: number;
	/** 0-based rank in each facet that contributed */
	facetRanks: Partial<Record<Facet, number>>;
}

// ============================================================================
// Listing Records
// ============================================================================

export interface PriceRange {
	low: number;
	high: number;
}

export interface ListingRecord {
	id: EntityId;
	/** Single asking price */
	listPrice?: number;
	/** Price band, either structured or as a "low-high" string */
	priceRange?: PriceRange | string;
	bedrooms?: number;
	bathrooms?: number;
	propertyType?: string;
	amenities?: string[];
	description?: string;
	/** Remaining payload fields; never read by the filter */
	attributes?: Record<string, unknown>;
}

export interface FilterSpec {
	minPrice?: number;
	maxPrice?: number;
	minBedrooms?: number;
	maxBedrooms?: number;
	minBathrooms?: number;
	maxBathrooms?: number;
	/** Exact match against ListingRecord.propertyType */
	propertyType?: string;
	/** Every amenity listed must be present */
	requiredAmenities?: string[];
}

// ============================================================================
// Collaborators
// ============================================================================

export interface FacetVectorStore {
	/** Stored vector for an entity in one facet, or null when it was never indexed there */
	getFacetVector(id: EntityId, facet: Facet, signal?: AbortSignal): Promise<number[] | null>;
	/** Nearest neighbors to `vector` within one facet, best first */
	queryNeighbors(facet: Facet, vector: number[], limit: number, signal?: AbortSignal): Promise<RankedList>;
}

export interface ListingRecordStore {
	/** Missing IDs are simply absent from the returned map */
	getRecords(ids: EntityId[], signal?: AbortSignal): Promise<Map<EntityId, ListingRecord>>;
}

// ============================================================================
// Search Results
// ============================================================================

export interface SearchRequest {
	queryId: EntityId;
	/** Weight profile name, e.g. "balanced" */
	mode: string;
	filters?: FilterSpec;
	/** Maximum results (default from config) */
	topK?: number;
	/** Cancels every in-flight collaborator call */
	signal?: AbortSignal;
}

export interface SearchHit {
	record: ListingRecord;
	score: number;
	facetRanks: Partial<Record<Facet, number>>;
}

export interface SearchMetadata {
	mode: string;
	topK: number;
	/** Neighbors returned per facet */
	facetHits: Record<Facet, number>;
	fusedCandidates: number;
	hydratedRecords: number;
	filteredOut: number;
	durationMs: number;
}

export interface SearchResult {
	results: SearchHit[];
	metadata: SearchMetadata;
}
