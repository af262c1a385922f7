/**
 * In-Memory Facet Store
 *
 * Implements both collaborator interfaces in process: one vector map per
 * facet searched by brute-force cosine similarity, plus a record map.
 * Vectors and records are copied on the way in and on the way out.
 * Meant for tests and small local datasets; production deployments put a
 * real vector database behind the same interfaces.
 */

import { FACETS, type EntityId, type Facet, type FacetVectorStore, type ListingRecord, type ListingRecordStore, type RankedList } from "../types";

export interface MemoryFacetStore extends FacetVectorStore, ListingRecordStore {
	/** Store (or replace) an entity's vector in one facet */
	upsertVector(id: EntityId, facet: Facet, vector: number[]): void;

	/** Store (or replace) a listing record */
	upsertRecord(record: ListingRecord): void;

	/** Remove an entity from every facet and the record map */
	delete(id: EntityId): void;

	/** Number of vectors stored for a facet */
	count(facet: Facet): number;

	clear(): void;
}

// ============================================================================
// Vector Math Utilities
// ============================================================================

/**
 * Cosine similarity in [-1, 1]. Throws on dimension mismatch.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
	}

	let dotProduct = 0;
	let normA = 0;
	let normB = 0;

	for (let i = 0; i < a.length; i++) {
		dotProduct += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}

	const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
	if (magnitude === 0) return 0;

	return dotProduct / magnitude;
}

// ============================================================================
// Implementation
// ============================================================================

export function createMemoryFacetStore(): MemoryFacetStore {
	const vectors = new Map<Facet, Map<EntityId, number[]>>(FACETS.map((facet) => [facet, new Map()]));
	const records = new Map<EntityId, ListingRecord>();

	function facetVectors(facet: Facet): Map<EntityId, number[]> {
		let map = vectors.get(facet);
		if (!map) {
			map = new Map();
			vectors.set(facet, map);
		}
		return map;
	}

	return {
		upsertVector(id: EntityId, facet: Facet, vector: number[]): void {
			facetVectors(facet).set(id, [...vector]);
		},

		upsertRecord(record: ListingRecord): void {
			records.set(record.id, structuredClone(record));
		},

		delete(id: EntityId): void {
			for (const map of vectors.values()) map.delete(id);
			records.delete(id);
		},

		count(facet: Facet): number {
			return facetVectors(facet).size;
		},

		clear(): void {
			for (const map of vectors.values()) map.clear();
			records.clear();
		},

		async getFacetVector(id: EntityId, facet: Facet, signal?: AbortSignal): Promise<number[] | null> {
			signal?.throwIfAborted();
			const vector = facetVectors(facet).get(id);
			return vector ? [...vector] : null;
		},

		async queryNeighbors(facet: Facet, vector: number[], limit: number, signal?: AbortSignal): Promise<RankedList> {
			signal?.throwIfAborted();
			if (vector.length === 0 || limit <= 0) return [];

			const results: RankedList = [];
			for (const [id, stored] of facetVectors(facet)) {
				results.push({ id, score: cosineSimilarity(vector, stored) });
			}

			// Stable sort: equal similarity keeps insertion order
			results.sort((a, b) => b.score - a.score);
			return results.slice(0, limit);
		},

		async getRecords(ids: EntityId[], signal?: AbortSignal): Promise<Map<EntityId, ListingRecord>> {
			signal?.throwIfAborted();
			const found = new Map<EntityId, ListingRecord>();
			for (const id of ids) {
				const record = records.get(id);
				if (record) found.set(id, structuredClone(record));
			}
			return found;
		},
	};
}
