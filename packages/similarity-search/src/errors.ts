/**
 * Error taxonomy for similarity search.
 *
 * Query-level failures are thrown as subclasses of SimilaritySearchError.
 * Per-record problems found while filtering are reported as
 * RecordParseWarning values and never thrown.
 */

import type { EntityId, Facet } from "./types";

export type SimilaritySearchErrorCode =
	| "INVALID_WEIGHT"
	| "UNKNOWN_SEARCH_MODE"
	| "QUERY_ENTITY_NOT_FOUND"
	| "COLLABORATOR_FAILURE"
	| "SEARCH_CANCELLED"
	| "INVALID_SEARCH_REQUEST"
	| "INVALID_CONFIG";

export class SimilaritySearchError extends Error {
	public readonly code: SimilaritySearchErrorCode;

	constructor(message: string, code: SimilaritySearchErrorCode, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SimilaritySearchError";
		this.code = code;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

export class InvalidWeightError extends SimilaritySearchError {
	constructor(
		public readonly facet: string,
		public readonly weight: number,
		profile?: string,
	) {
		const where = profile ? ` in profile "${profile}"` : "";
		super(`Invalid weight ${weight} for facet "${facet}"${where}`, "INVALID_WEIGHT");
		this.name = "InvalidWeightError";
	}
}

export class UnknownSearchModeError extends SimilaritySearchError {
	constructor(
		public readonly mode: string,
		public readonly available: readonly string[],
	) {
		super(`Unknown search mode "${mode}" (available: ${available.join(", ")})`, "UNKNOWN_SEARCH_MODE");
		this.name = "UnknownSearchModeError";
	}
}

export class QueryEntityNotFoundError extends SimilaritySearchError {
	constructor(
		public readonly entityId: EntityId,
		public readonly facet: Facet,
	) {
		super(`Entity ${String(entityId)} has no vector in facet "${facet}"`, "QUERY_ENTITY_NOT_FOUND");
		this.name = "QueryEntityNotFoundError";
	}
}

export class CollaboratorFailureError extends SimilaritySearchError {
	/** Every failure observed before siblings were cancelled */
	public readonly causes: unknown[];

	constructor(
		public readonly operation: string,
		causes: unknown[],
	) {
		const first = causes[0];
		const detail = first instanceof Error ? first.message : String(first);
		super(`${operation} failed: ${detail}`, "COLLABORATOR_FAILURE", { cause: first });
		this.name = "CollaboratorFailureError";
		this.causes = causes;
	}
}

export class SearchCancelledError extends SimilaritySearchError {
	constructor(reason?: unknown) {
		super("Search was cancelled by the caller", "SEARCH_CANCELLED", { cause: reason });
		this.name = "SearchCancelledError";
	}
}

export class InvalidSearchRequestError extends SimilaritySearchError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(message, "INVALID_SEARCH_REQUEST");
		this.name = "InvalidSearchRequestError";
	}
}

export class InvalidConfigError extends SimilaritySearchError {
	constructor(public readonly issues: string[]) {
		super(`Invalid search configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
		this.name = "InvalidConfigError";
	}
}

export function isSimilaritySearchError(value: unknown): value is SimilaritySearchError {
	return value instanceof SimilaritySearchError;
}

/** A record excluded because a filter-relevant field could not be read */
export interface RecordParseWarning {
	recordId: EntityId;
	field: "record" | "priceRange" | "listPrice" | "bedrooms" | "bathrooms" | "amenities";
	message: string;
}
