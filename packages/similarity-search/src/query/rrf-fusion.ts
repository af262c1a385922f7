/**
 * Weighted RRF Fusion - Reciprocal Rank Fusion across facet rankings
 *
 * Each facet ranks neighbors with its own similarity metric, so raw scores
 * are not comparable. Fusion uses positions only:
 *
 *   score(d) = Σ_f  w_f / (k + rank_f(d) + 1)      (rank is 0-based)
 *
 * summed over the facets where d appears.
 */

import { InvalidWeightError } from "../errors";
import { FACETS, type EntityId, type Facet, type FusedResult, type PerFacetRankings, type WeightProfile } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface RrfFusionOptions {
	/** RRF smoothing constant (default: 60) */
	k?: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RRF_K = 60;

// ============================================================================
// Implementation
// ============================================================================

/**
 * Fuse per-facet rankings into one list ordered by weighted RRF score.
 *
 * Facets missing from `perFacet` or weighted 0 contribute nothing. Ties keep
 * the order in which IDs were first seen (facets visited in FACETS order).
 */
export function fuseWeightedRrf(
	perFacet: PerFacetRankings,
	weights: WeightProfile,
	options?: RrfFusionOptions,
): FusedResult[] {
	const k = options?.k ?? DEFAULT_RRF_K;
	if (!Number.isFinite(k) || k < 0) {
		throw new RangeError(`RRF constant k must be a finite number >= 0, got ${k}`);
	}

	assertValidWeights(weights);

	const fused = new Map<EntityId, FusedResult>();

	for (const facet of FACETS) {
		const ranked = perFacet[facet];
		const weight = weights[facet] ?? 0;
		if (!ranked || ranked.length === 0 || weight === 0) continue;

		ranked.forEach((neighbor, rank) => {
			let entry = fused.get(neighbor.id);
			if (!entry) {
				entry = { id: neighbor.id, score: 0, facetRanks: {} };
				fused.set(neighbor.id, entry);
			}
			// A repeated ID within one facet only counts at its best rank
			if (entry.facetRanks[facet] !== undefined) return;

			entry.facetRanks[facet] = rank;
			entry.score += rrfContribution(weight, rank, k);
		});
	}

	return sortByScoreDescending([...fused.values()]);
}

/** Weighted contribution of a 0-based rank */
export function rrfContribution(weight: number, rank: number, k: number = DEFAULT_RRF_K): number {
	return weight * (1 / (k + rank + 1));
}

// ============================================================================
// Pure Functions
// ============================================================================

function assertValidWeights(weights: WeightProfile): void {
	for (const [facet, weight] of Object.entries(weights)) {
		if (weight === undefined) continue;
		if (!Number.isFinite(weight) || weight < 0) {
			throw new InvalidWeightError(facet, weight);
		}
	}
}

// Array.prototype.sort is stable, so equal scores keep first-appearance order
function sortByScoreDescending(results: FusedResult[]): FusedResult[] {
	return results.sort((a, b) => b.score - a.score);
}

/** Facets that placed `result` in their ranking */
export function contributingFacets(result: FusedResult): Facet[] {
	return FACETS.filter((facet) => result.facetRanks[facet] !== undefined);
}
