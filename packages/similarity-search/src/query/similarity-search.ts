/**
 * Similarity Search - Multi-facet similar-listing retrieval
 *
 * Orchestrates the full pipeline for one query listing:
 * 1. Resolve the weight profile for the requested mode
 * 2. Fetch the query's vector in every facet (parallel)
 * 3. Fetch over-sized neighbor lists per facet (parallel)
 * 4. Weighted RRF fusion
 * 5. Hydrate the best fused candidates, excluding the query itself
 * 6. Post-filter, then truncate to topK
 *
 * Fails closed: a facet that cannot be fetched fails the whole search.
 */

import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from "../config";
import { createLogger, createSearchMetrics, type Logger, type SearchMetrics } from "../diagnostics";
import { InvalidSearchRequestError, QueryEntityNotFoundError } from "../errors";
import {
	FACETS,
	type EntityId,
	type Facet,
	type FacetVectorStore,
	type FilterSpec,
	type FusedResult,
	type ListingRecord,
	type ListingRecordStore,
	type PerFacetRankings,
	type SearchHit,
	type SearchMetadata,
	type SearchRequest,
	type SearchResult,
} from "../types";
import { fanOut } from "./fan-out";
import { filterListings, parseFilterSpec } from "./listing-filter";
import { fuseWeightedRrf } from "./rrf-fusion";
import { createWeightProfileRegistry, type WeightProfileRegistry } from "./weight-profiles";

// ============================================================================
// Types
// ============================================================================

export interface SimilaritySearchDeps {
	vectorStore: FacetVectorStore;
	recordStore: ListingRecordStore;
	/** Parsed configuration (default: DEFAULT_SEARCH_CONFIG) */
	config?: SearchConfig;
	/** Profile table (default: built-ins plus config.profiles) */
	profiles?: WeightProfileRegistry;
	logger?: Logger;
	metrics?: SearchMetrics;
}

export interface SearchCallOptions {
	signal?: AbortSignal;
}

export interface SimilaritySearch {
	/** Records similar to `queryId`, best first, at most `topK` */
	search(
		queryId: EntityId,
		mode: string,
		filters?: FilterSpec,
		topK?: number,
		options?: SearchCallOptions,
	): Promise<ListingRecord[]>;

	/** Same pipeline, returning fused scores, facet ranks and stage counts */
	searchDetailed(request: SearchRequest): Promise<SearchResult>;

	readonly metrics: SearchMetrics;
}

// ============================================================================
// Implementation
// ============================================================================

export function createSimilaritySearch(deps: SimilaritySearchDeps): SimilaritySearch {
	const config = deps.config ?? DEFAULT_SEARCH_CONFIG;
	const profiles = deps.profiles ?? createWeightProfileRegistry(config.profiles);
	const logger = deps.logger ?? createLogger({ level: config.logLevel });
	const metrics = deps.metrics ?? createSearchMetrics();
	const { vectorStore, recordStore } = deps;

	async function runPipeline(request: SearchRequest, log: Logger): Promise<Omit<SearchMetadata, "durationMs"> & { results: SearchHit[] }> {
		const { queryId, mode, signal } = request;

		// 1. Validate request
		const weights = profiles.resolve(mode);
		const topK = resolveTopK(request.topK ?? config.defaultTopK);
		const filters = request.filters === undefined ? undefined : parseFilterSpec(request.filters);
		const fanOutOptions = { timeoutMs: config.collaboratorTimeoutMs, signal };

		// 2. Query vectors, one per facet
		const vectors = await fanOut(
			"getFacetVector",
			FACETS.map((facet) => async (callSignal: AbortSignal) => {
				const vector = await vectorStore.getFacetVector(queryId, facet, callSignal);
				if (!vector || vector.length === 0) {
					throw new QueryEntityNotFoundError(queryId, facet);
				}
				return vector;
			}),
			fanOutOptions,
		);
		log.debug("Fetched query vectors", { facets: FACETS.length });

		// 3. Neighbor lists, over-fetched to survive exclusion and filtering
		const neighborLimit = topK * config.overFetchFactor;
		const neighborLists = await fanOut(
			"queryNeighbors",
			FACETS.map((facet, i) => (callSignal: AbortSignal) =>
				vectorStore.queryNeighbors(facet, vectors[i], neighborLimit, callSignal),
			),
			fanOutOptions,
		);
		metrics.facetQueries.add(FACETS.length);

		const perFacet: PerFacetRankings = {};
		const facetHits: Record<Facet, number> = { location: 0, features: 0, visual: 0 };
		FACETS.forEach((facet, i) => {
			perFacet[facet] = neighborLists[i];
			facetHits[facet] = neighborLists[i].length;
		});
		log.debug("Fetched neighbor lists", { limit: neighborLimit, ...facetHits });

		// 4. Fusion
		const fused = fuseWeightedRrf(perFacet, weights, { k: config.rrfK });

		// 5. Hydration
		const candidates = fused
			.filter((result) => result.id !== queryId)
			.slice(0, topK * config.hydrationFactor);
		const hydrated = await hydrate(candidates, fanOutOptions);
		metrics.recordsHydrated.add(hydrated.length);
		log.debug("Hydrated candidates", { fused: fused.length, requested: candidates.length, hydrated: hydrated.length });

		// 6. Post-filter
		const kept = new Set(
			filterListings(
				hydrated.map((hit) => hit.record),
				filters,
				{ logger: log, onWarning: () => metrics.recordParseWarnings.inc() },
			),
		);
		const filtered = hydrated.filter((hit) => kept.has(hit.record));
		const filteredOut = hydrated.length - filtered.length;
		metrics.recordsFilteredOut.add(filteredOut);

		// 7. Truncate
		return {
			results: filtered.slice(0, topK),
			mode,
			topK,
			facetHits,
			fusedCandidates: fused.length,
			hydratedRecords: hydrated.length,
			filteredOut,
		};
	}

	async function hydrate(
		candidates: FusedResult[],
		options: { timeoutMs: number; signal?: AbortSignal },
	): Promise<SearchHit[]> {
		if (candidates.length === 0) return [];

		const [records] = await fanOut(
			"getRecords",
			[(callSignal: AbortSignal) => recordStore.getRecords(candidates.map((c) => c.id), callSignal)],
			options,
		);

		const hits: SearchHit[] = [];
		for (const candidate of candidates) {
			const record = records.get(candidate.id);
			if (!record) continue;
			hits.push({ record, score: candidate.score, facetRanks: candidate.facetRanks });
		}
		return hits;
	}

	const similaritySearch: SimilaritySearch = {
		metrics,

		async searchDetailed(request: SearchRequest): Promise<SearchResult> {
			const log = logger.child({ queryId: String(request.queryId), mode: request.mode });
			const stop = metrics.searchDuration.start();

			try {
				const { results, ...stages } = await runPipeline(request, log);
				const durationMs = stop();
				metrics.searchesExecuted.inc();
				log.info("Search complete", { results: results.length, durationMs: Math.round(durationMs) });
				return { results, metadata: { ...stages, durationMs } };
			} catch (error) {
				stop();
				metrics.searchFailures.inc();
				log.error("Search failed", error instanceof Error ? error : new Error(String(error)));
				throw error;
			}
		},

		async search(queryId, mode, filters, topK, options): Promise<ListingRecord[]> {
			const { results } = await similaritySearch.searchDetailed({
				queryId,
				mode,
				filters,
				topK,
				signal: options?.signal,
			});
			return results.map((hit) => hit.record);
		},
	};

	return similaritySearch;
}

// ============================================================================
// Request Validation
// ============================================================================

function resolveTopK(topK: number): number {
	if (!Number.isInteger(topK) || topK < 1) {
		throw new InvalidSearchRequestError(`topK must be a positive integer, got ${topK}`, ["topK"]);
	}
	return topK;
}
