/**
 * Weighted RRF fusion tests
 */

import { describe, expect, test } from "vitest";
import { InvalidWeightError } from "../errors";
import { contributingFacets, fuseWeightedRrf, rrfContribution } from "../query/rrf-fusion";
import { BUILT_IN_PROFILES } from "../query/weight-profiles";
import type { EntityId, PerFacetRankings, RankedList, WeightProfile } from "../types";

// ============================================================================
// Helpers
// ============================================================================

function ranked(...ids: EntityId[]): RankedList {
	return ids.map((id, index) => ({ id, score: 1 - index * 0.1 }));
}

const BALANCED: WeightProfile = { location: 0.4, features: 0.4, visual: 0.2 };

// ============================================================================
// Scoring
// ============================================================================

describe("fuseWeightedRrf scoring", () => {
	test("rotated rankings fuse to the hand-computed scores and order", () => {
		const perFacet: PerFacetRankings = {
			location: ranked("A", "B", "C"),
			features: ranked("B", "C", "A"),
			visual: ranked("C", "A", "B"),
		};

		const fused = fuseWeightedRrf(perFacet, BALANCED, { k: 60 });

		const expectedA = 0.4 / 61 + 0.4 / 63 + 0.2 / 62;
		const expectedB = 0.4 / 62 + 0.4 / 61 + 0.2 / 63;
		const expectedC = 0.4 / 63 + 0.4 / 62 + 0.2 / 61;

		expect(fused.map((r) => r.id)).toEqual(["B", "A", "C"]);
		expect(fused[0].score).toBeCloseTo(expectedB, 12);
		expect(fused[1].score).toBeCloseTo(expectedA, 12);
		expect(fused[2].score).toBeCloseTo(expectedC, 12);
	});

	test("records the 0-based rank from every contributing facet", () => {
		const fused = fuseWeightedRrf(
			{ location: ranked("A", "B"), visual: ranked("B") },
			BALANCED,
		);

		const b = fused.find((r) => r.id === "B");
		expect(b?.facetRanks).toEqual({ location: 1, visual: 0 });
		expect(b && contributingFacets(b)).toEqual(["location", "visual"]);
	});

	test("an ID missing from a facet gets no contribution from it", () => {
		const fused = fuseWeightedRrf({ location: ranked("A"), features: ranked("B") }, BALANCED);

		const a = fused.find((r) => r.id === "A");
		expect(a?.score).toBeCloseTo(rrfContribution(0.4, 0), 12);
	});

	test("k is configurable", () => {
		const fused = fuseWeightedRrf({ location: ranked("A", "B") }, { location: 1 }, { k: 0 });

		expect(fused[0].score).toBe(1);
		expect(fused[1].score).toBe(0.5);
	});

	test("repeated ID within a facet only counts at its first rank", () => {
		const fused = fuseWeightedRrf({ location: ranked("A", "A", "B") }, { location: 1 });

		expect(fused.map((r) => r.id)).toEqual(["A", "B"]);
		expect(fused[0].score).toBeCloseTo(1 / 61, 12);
		expect(fused[1].score).toBeCloseTo(1 / 63, 12);
	});

	test("numeric and string IDs are distinct", () => {
		const fused = fuseWeightedRrf({ location: ranked(1, "1") }, { location: 1 });

		expect(fused.map((r) => r.id)).toEqual([1, "1"]);
	});
});

// ============================================================================
// Edge Cases
// ============================================================================

describe("fuseWeightedRrf edge cases", () => {
	test("empty facet map returns empty result", () => {
		expect(fuseWeightedRrf({}, BALANCED)).toEqual([]);
	});

	test("facet with an empty ranked list contributes nothing", () => {
		const withEmpty = fuseWeightedRrf({ location: ranked("A"), visual: [] }, BALANCED);
		const without = fuseWeightedRrf({ location: ranked("A") }, BALANCED);

		expect(withEmpty).toEqual(without);
	});

	test("negative weight is rejected", () => {
		expect(() => fuseWeightedRrf({ location: ranked("A") }, { location: -0.1 })).toThrow(InvalidWeightError);
	});

	test("non-finite weight is rejected", () => {
		expect(() => fuseWeightedRrf({ location: ranked("A") }, { visual: Number.NaN })).toThrow(InvalidWeightError);
	});

	test("negative k is rejected", () => {
		expect(() => fuseWeightedRrf({ location: ranked("A") }, BALANCED, { k: -1 })).toThrow(RangeError);
	});

	test("equal scores keep first-appearance order", () => {
		const fused = fuseWeightedRrf(
			{ location: ranked("P"), features: ranked("Q") },
			{ location: 0.5, features: 0.5 },
		);

		expect(fused.map((r) => r.id)).toEqual(["P", "Q"]);
		expect(fused[0].score).toBe(fused[1].score);
	});
});

// ============================================================================
// Properties
// ============================================================================

describe("fuseWeightedRrf properties", () => {
	const lists: PerFacetRankings = {
		location: ranked("A", "B", "C", "D"),
		features: ranked("D", "C", "B", "A"),
		visual: ranked("C", "E", "A"),
	};

	test("a zero-weighted facet has no influence on the fused ordering", () => {
		const weights: WeightProfile = { location: 0.7, features: 0.3, visual: 0 };

		const withFacet = fuseWeightedRrf(lists, weights);
		const withoutFacet = fuseWeightedRrf({ location: lists.location, features: lists.features }, weights);

		expect(withFacet).toEqual(withoutFacet);
		expect(withFacet.some((r) => r.id === "E")).toBe(false);
	});

	test("fusion is deterministic", () => {
		const first = fuseWeightedRrf(lists, BALANCED);
		const second = fuseWeightedRrf(lists, BALANCED);

		expect(second).toEqual(first);
	});

	test("rank 0 in every facet outranks rank 0 in a single facet for every built-in profile", () => {
		for (const weights of Object.values(BUILT_IN_PROFILES)) {
			const everywhere = fuseWeightedRrf(
				{ location: ranked("X", "Y"), features: ranked("X", "Y"), visual: ranked("X", "Y") },
				weights,
			);
			const once = fuseWeightedRrf(
				{ location: ranked("Y", "X"), features: ranked("X", "Y"), visual: ranked("X", "Y") },
				weights,
			);

			const xEverywhere = everywhere.find((r) => r.id === "X");
			const yOnce = once.find((r) => r.id === "Y");
			expect(xEverywhere && yOnce && xEverywhere.score > yOnce.score).toBe(true);
		}
	});

	test("inputs are not mutated", () => {
		const snapshot = JSON.stringify(lists);
		fuseWeightedRrf(lists, BALANCED);

		expect(JSON.stringify(lists)).toBe(snapshot);
	});
});
