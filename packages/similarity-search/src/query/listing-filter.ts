/**
 * Listing Post-Filters
 *
 * Structured constraints applied to hydrated candidates after fusion.
 * Records are evaluated independently: a record with a missing or malformed
 * field is excluded (and, if malformed, reported as a warning) without
 * failing the batch.
 */

import { z } from "zod";
import type { Logger } from "../diagnostics";
import { nullLogger } from "../diagnostics";
import { InvalidSearchRequestError, type RecordParseWarning } from "../errors";
import type { FilterSpec, ListingRecord, PriceRange } from "../types";

// ============================================================================
// Schema
// ============================================================================

const bound = z.number().finite().nonnegative();
const countBound = z.number().int().nonnegative();

export const FilterSpecSchema = z
	.object({
		minPrice: bound.optional(),
		maxPrice: bound.optional(),
		minBedrooms: countBound.optional(),
		maxBedrooms: countBound.optional(),
		minBathrooms: bound.optional(),
		maxBathrooms: bound.optional(),
		propertyType: z.string().min(1).optional(),
		requiredAmenities: z.array(z.string().min(1)).optional(),
	})
	.strict()
	.refine((s) => s.minPrice === undefined || s.maxPrice === undefined || s.minPrice <= s.maxPrice, {
		message: "minPrice must not exceed maxPrice",
		path: ["minPrice"],
	})
	.refine((s) => s.minBedrooms === undefined || s.maxBedrooms === undefined || s.minBedrooms <= s.maxBedrooms, {
		message: "minBedrooms must not exceed maxBedrooms",
		path: ["minBedrooms"],
	})
	.refine((s) => s.minBathrooms === undefined || s.maxBathrooms === undefined || s.minBathrooms <= s.maxBathrooms, {
		message: "minBathrooms must not exceed maxBathrooms",
		path: ["minBathrooms"],
	});

/** Validate an untrusted filter spec; throws InvalidSearchRequestError listing every issue */
export function parseFilterSpec(input: unknown): FilterSpec {
	const result = FilterSpecSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "filters"}: ${issue.message}`);
		throw new InvalidSearchRequestError(`Invalid filter spec: ${issues.join("; ")}`, issues);
	}
	return result.data;
}

// ============================================================================
// Types
// ============================================================================

export type FilterRejection =
	| "missing_price"
	| "price_out_of_range"
	| "missing_bedrooms"
	| "bedrooms_out_of_range"
	| "missing_bathrooms"
	| "bathrooms_out_of_range"
	| "property_type_mismatch"
	| "missing_amenity"
	| "malformed_record";

export type FilterVerdict =
	| { pass: true }
	| { pass: false; reason: FilterRejection; warning?: RecordParseWarning };

export interface ListingFilterOptions {
	logger?: Logger;
	/** Called once per record excluded for malformed data */
	onWarning?: (warning: RecordParseWarning) => void;
}

type FieldRead<T> = { ok: true; value: T | undefined } | { ok: false; warning: RecordParseWarning };

const PASS: FilterVerdict = { pass: true };

// ============================================================================
// Filtering
// ============================================================================

/**
 * Keep the records that satisfy every constraint in `spec`, in their
 * original order. Without a spec every record is kept.
 */
export function filterListings(
	records: readonly ListingRecord[],
	spec?: FilterSpec,
	options: ListingFilterOptions = {},
): ListingRecord[] {
	if (!spec) return [...records];

	const logger = options.logger ?? nullLogger;
	const kept: ListingRecord[] = [];

	for (const record of records) {
		const verdict = evaluateSafely(record, spec);
		if (verdict.pass) {
			kept.push(record);
			continue;
		}
		if (verdict.warning) {
			logger.warn("Excluding listing with malformed data", {
				recordId: verdict.warning.recordId,
				field: verdict.warning.field,
				detail: verdict.warning.message,
			});
			options.onWarning?.(verdict.warning);
		}
	}

	return kept;
}

/**
 * Evaluate one record. Predicates run in a fixed order and the first
 * failure decides the rejection reason.
 */
export function matchesFilterSpec(record: ListingRecord, spec: FilterSpec): FilterVerdict {
	// 1. Price
	const price = readPriceRange(record);
	if (!price.ok) return { pass: false, reason: "malformed_record", warning: price.warning };
	if (!price.value) return { pass: false, reason: "missing_price" };
	if (spec.minPrice !== undefined && price.value.high < spec.minPrice) {
		return { pass: false, reason: "price_out_of_range" };
	}
	if (spec.maxPrice !== undefined && price.value.low > spec.maxPrice) {
		return { pass: false, reason: "price_out_of_range" };
	}

	// 2. Bedrooms
	const bedrooms = readCount(record, "bedrooms");
	if (!bedrooms.ok) return { pass: false, reason: "malformed_record", warning: bedrooms.warning };
	if (bedrooms.value === undefined) return { pass: false, reason: "missing_bedrooms" };
	if (!withinBounds(bedrooms.value, spec.minBedrooms, spec.maxBedrooms)) {
		return { pass: false, reason: "bedrooms_out_of_range" };
	}

	// 3. Bathrooms
	const bathrooms = readCount(record, "bathrooms");
	if (!bathrooms.ok) return { pass: false, reason: "malformed_record", warning: bathrooms.warning };
	if (bathrooms.value === undefined) return { pass: false, reason: "missing_bathrooms" };
	if (!withinBounds(bathrooms.value, spec.minBathrooms, spec.maxBathrooms)) {
		return { pass: false, reason: "bathrooms_out_of_range" };
	}

	// 4. Property type
	if (spec.propertyType !== undefined && record.propertyType !== spec.propertyType) {
		return { pass: false, reason: "property_type_mismatch" };
	}

	// 5. Amenities
	if (spec.requiredAmenities && spec.requiredAmenities.length > 0) {
		const amenities = readAmenities(record);
		if (!amenities.ok) return { pass: false, reason: "malformed_record", warning: amenities.warning };
		const has = amenities.value;
		if (!has || !spec.requiredAmenities.every((amenity) => has(amenity))) {
			return { pass: false, reason: "missing_amenity" };
		}
	}

	return PASS;
}

// ============================================================================
// Field Readers
// ============================================================================

function evaluateSafely(record: ListingRecord, spec: FilterSpec): FilterVerdict {
	try {
		return matchesFilterSpec(record, spec);
	} catch (error) {
		return {
			pass: false,
			reason: "malformed_record",
			warning: {
				recordId: record?.id ?? "unknown",
				field: "record",
				message: error instanceof Error ? error.message : String(error),
			},
		};
	}
}

/**
 * Effective price band: the range when present, otherwise [listPrice, listPrice].
 */
export function readPriceRange(record: ListingRecord): FieldRead<PriceRange> {
	const range = record.priceRange;

	if (typeof range === "string" && range.trim() !== "") {
		const parsed = parsePriceRange(range);
		if (!parsed) {
			return malformed(record, "priceRange", `Cannot parse price range "${range}"`);
		}
		return { ok: true, value: parsed };
	}

	if (range !== undefined && typeof range === "object" && range !== null) {
		if (!Number.isFinite(range.low) || !Number.isFinite(range.high) || range.low > range.high) {
			return malformed(record, "priceRange", `Invalid price range ${range.low}-${range.high}`);
		}
		return { ok: true, value: { low: range.low, high: range.high } };
	}

	if (record.listPrice !== undefined && record.listPrice !== null) {
		if (typeof record.listPrice !== "number" || !Number.isFinite(record.listPrice)) {
			return malformed(record, "listPrice", `Invalid list price ${String(record.listPrice)}`);
		}
		return { ok: true, value: { low: record.listPrice, high: record.listPrice } };
	}

	return { ok: true, value: undefined };
}

const DECIMAL_NUMBER = /^\+?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Parse "low-high" (e.g. "350000-425000"); null when either side is not a decimal number */
export function parsePriceRange(text: string): PriceRange | null {
	const parts = text.split("-");
	if (parts.length !== 2) return null;

	const [lowText, highText] = parts.map((part) => part.trim());
	if (!DECIMAL_NUMBER.test(lowText) || !DECIMAL_NUMBER.test(highText)) return null;

	const low = Number(lowText);
	const high = Number(highText);
	if (!Number.isFinite(low) || !Number.isFinite(high) || low > high) return null;

	return { low, high };
}

function readCount(record: ListingRecord, field: "bedrooms" | "bathrooms"): FieldRead<number> {
	const value: unknown = record[field];
	if (value === undefined || value === null) return { ok: true, value: undefined };
	if (typeof value !== "number" || !Number.isFinite(value)) {
		return malformed(record, field, `Invalid ${field} value ${String(value)}`);
	}
	return { ok: true, value };
}

/**
 * Amenity lookup: the amenity list when the record has one, otherwise a
 * substring search over the description.
 */
function readAmenities(record: ListingRecord): FieldRead<(amenity: string) => boolean> {
	const amenities: unknown = record.amenities;
	if (amenities !== undefined && amenities !== null) {
		if (!Array.isArray(amenities)) {
			return malformed(record, "amenities", "Amenities must be a list");
		}
		const set = new Set(amenities.filter((a): a is string => typeof a === "string"));
		return { ok: true, value: (amenity) => set.has(amenity) };
	}

	const description = record.description;
	if (typeof description === "string" && description.length > 0) {
		return { ok: true, value: (amenity) => description.includes(amenity) };
	}

	return { ok: true, value: undefined };
}

function withinBounds(value: number, min?: number, max?: number): boolean {
	if (min !== undefined && value < min) return false;
	if (max !== undefined && value > max) return false;
	return true;
}

function malformed(record: ListingRecord, field: RecordParseWarning["field"], message: string): { ok: false; warning: RecordParseWarning } {
	return { ok: false, warning: { recordId: record.id, field, message } };
}
