/**
 * Listing post-filter tests
 */

import { describe, expect, test } from "vitest";
import { createLogger } from "../diagnostics";
import { InvalidSearchRequestError, type RecordParseWarning } from "../errors";
import {
	filterListings,
	matchesFilterSpec,
	parseFilterSpec,
	parsePriceRange,
	readPriceRange,
} from "../query/listing-filter";
import type { FilterSpec, ListingRecord } from "../types";

// ============================================================================
// Helpers
// ============================================================================

function makeListing(overrides: Partial<ListingRecord> & { id: ListingRecord["id"] }): ListingRecord {
	return {
		listPrice: 400000,
		bedrooms: 3,
		bathrooms: 2,
		propertyType: "house",
		amenities: ["garage"],
		...overrides,
	};
}

function ids(records: ListingRecord[]): Array<ListingRecord["id"]> {
	return records.map((r) => r.id);
}

// ============================================================================
// Counts
// ============================================================================

describe("bedroom and bathroom ranges", () => {
	test("bedroom range keeps 2 and 3, drops 1, 4 and missing", () => {
		const records = [
			makeListing({ id: "b1", bedrooms: 1 }),
			makeListing({ id: "b2", bedrooms: 2 }),
			makeListing({ id: "b3", bedrooms: 3 }),
			makeListing({ id: "b4", bedrooms: 4 }),
			makeListing({ id: "none", bedrooms: undefined }),
		];

		const result = filterListings(records, { minBedrooms: 2, maxBedrooms: 3 });

		expect(ids(result)).toEqual(["b2", "b3"]);
	});

	test("missing bathroom count excludes the record even without bathroom bounds", () => {
		const records = [makeListing({ id: 1 }), makeListing({ id: 2, bathrooms: undefined })];

		expect(ids(filterListings(records, {}))).toEqual([1]);
	});

	test("fractional bathroom bounds are honoured", () => {
		const records = [makeListing({ id: 1, bathrooms: 1.5 }), makeListing({ id: 2, bathrooms: 2.5 })];

		expect(ids(filterListings(records, { minBathrooms: 2 }))).toEqual([2]);
		expect(ids(filterListings(records, { maxBathrooms: 2 }))).toEqual([1]);
	});
});

// ============================================================================
// Price
// ============================================================================

describe("price filtering", () => {
	test("price range overlapping the requested band is kept", () => {
		const records = [
			makeListing({ id: "below", priceRange: "200000-300000" }),
			makeListing({ id: "overlap", priceRange: "350000-500000" }),
			makeListing({ id: "above", priceRange: "600000-700000" }),
		];

		const result = filterListings(records, { minPrice: 450000, maxPrice: 550000 });

		expect(ids(result)).toEqual(["overlap"]);
	});

	test("structured price range is used as-is", () => {
		const records = [makeListing({ id: 1, priceRange: { low: 100, high: 200 } })];

		expect(ids(filterListings(records, { minPrice: 150 }))).toEqual([1]);
		expect(ids(filterListings(records, { minPrice: 201 }))).toEqual([]);
	});

	test("list price is used when there is no price range", () => {
		const records = [makeListing({ id: "cheap", listPrice: 300 }), makeListing({ id: "dear", listPrice: 500 })];

		expect(ids(filterListings(records, { maxPrice: 400 }))).toEqual(["cheap"]);
		expect(ids(filterListings(records, { minPrice: 400 }))).toEqual(["dear"]);
	});

	test("price range takes precedence over list price", () => {
		const record = makeListing({ id: 1, listPrice: 900, priceRange: "100-200" });

		expect(readPriceRange(record)).toEqual({ ok: true, value: { low: 100, high: 200 } });
	});

	test("records without any price are excluded without a warning", () => {
		const warnings: RecordParseWarning[] = [];
		const records = [makeListing({ id: 1, listPrice: undefined })];

		const result = filterListings(records, {}, { onWarning: (w) => warnings.push(w) });

		expect(result).toEqual([]);
		expect(warnings).toEqual([]);
		expect(matchesFilterSpec(records[0], {})).toEqual({ pass: false, reason: "missing_price" });
	});

	test("unparsable price range excludes the record and reports a warning", () => {
		const logger = createLogger({ storeEntries: true, console: false });
		const warnings: RecordParseWarning[] = [];
		const records = [
			makeListing({ id: "ok" }),
			makeListing({ id: "bad", priceRange: "call-agent" }),
		];

		const result = filterListings(records, { minPrice: 1 }, { logger, onWarning: (w) => warnings.push(w) });

		expect(ids(result)).toEqual(["ok"]);
		expect(warnings).toEqual([
			{ recordId: "bad", field: "priceRange", message: 'Cannot parse price range "call-agent"' },
		]);

		const entries = logger.getEntries();
		expect(entries).toHaveLength(1);
		expect(entries[0].level).toBe("warn");
		expect(entries[0].message).toBe("Excluding listing with malformed data");
		expect(entries[0].context).toEqual({
			recordId: "bad",
			field: "priceRange",
			detail: 'Cannot parse price range "call-agent"',
		});
	});

	test("non-numeric bedroom value is reported as malformed", () => {
		const record: ListingRecord = { ...makeListing({ id: 7 }), bedrooms: Number.NaN };

		expect(matchesFilterSpec(record, {})).toEqual({
			pass: false,
			reason: "malformed_record",
			warning: { recordId: 7, field: "bedrooms", message: "Invalid bedrooms value NaN" },
		});
	});
});

describe("parsePriceRange", () => {
	test("parses low-high with optional spaces", () => {
		expect(parsePriceRange("350000-425000")).toEqual({ low: 350000, high: 425000 });
		expect(parsePriceRange(" 350000 - 425000 ")).toEqual({ low: 350000, high: 425000 });
	});

	test("rejects malformed ranges", () => {
		expect(parsePriceRange("100")).toBeNull();
		expect(parsePriceRange("5-3")).toBeNull();
		expect(parsePriceRange("1-2-3")).toBeNull();
		expect(parsePriceRange("-200")).toBeNull();
		expect(parsePriceRange("abc-def")).toBeNull();
	});

	test("accepts decimals and exponents but not hex or binary literals", () => {
		expect(parsePriceRange("1.5e5-200000.50")).toEqual({ low: 150000, high: 200000.5 });
		expect(parsePriceRange("0x10-0x20")).toBeNull();
		expect(parsePriceRange("0b101-0b111")).toBeNull();
		expect(parsePriceRange("Infinity-Infinity")).toBeNull();
	});

	test("hex price range excludes the record with a warning", () => {
		const warnings: RecordParseWarning[] = [];
		const records = [makeListing({ id: "hex", priceRange: "0x10-0x20" })];

		const result = filterListings(records, { maxPrice: 100 }, { onWarning: (w) => warnings.push(w) });

		expect(result).toEqual([]);
		expect(warnings).toEqual([
			{ recordId: "hex", field: "priceRange", message: 'Cannot parse price range "0x10-0x20"' },
		]);
	});
});

// ============================================================================
// Type & Amenities
// ============================================================================

describe("property type and amenities", () => {
	test("property type must match exactly", () => {
		const records = [makeListing({ id: 1, propertyType: "condo" }), makeListing({ id: 2, propertyType: "Condo" })];

		expect(ids(filterListings(records, { propertyType: "condo" }))).toEqual([1]);
	});

	test("every required amenity must be listed", () => {
		const records = [
			makeListing({ id: "both", amenities: ["pool", "garage"] }),
			makeListing({ id: "pool-only", amenities: ["pool", "gym"] }),
		];

		expect(ids(filterListings(records, { requiredAmenities: ["pool", "garage"] }))).toEqual(["both"]);
	});

	test("description is searched when a record has no amenity list", () => {
		const records = [
			makeListing({ id: "described", amenities: undefined, description: "Bright home with pool and garage" }),
			makeListing({ id: "bare", amenities: undefined }),
		];

		expect(ids(filterListings(records, { requiredAmenities: ["pool", "garage"] }))).toEqual(["described"]);
	});

	test("empty required amenity list does not constrain", () => {
		const records = [makeListing({ id: 1, amenities: [] })];

		expect(ids(filterListings(records, { requiredAmenities: [] }))).toEqual([1]);
	});
});

// ============================================================================
// Properties
// ============================================================================

describe("filterListings properties", () => {
	const records = [
		makeListing({ id: 1, bedrooms: 4 }),
		makeListing({ id: 2, bedrooms: 2, amenities: ["pool"] }),
		makeListing({ id: 3, bedrooms: 3, amenities: ["pool", "garage"] }),
		makeListing({ id: 4, bedrooms: 2, listPrice: 900000 }),
		makeListing({ id: 5, bedrooms: 3, amenities: ["pool"] }),
	];
	const spec: FilterSpec = { maxBedrooms: 3, maxPrice: 500000, requiredAmenities: ["pool"] };

	test("no spec returns a copy of every record", () => {
		const result = filterListings(records);

		expect(result).toEqual(records);
		expect(result).not.toBe(records);
	});

	test("survivors keep their relative order", () => {
		expect(ids(filterListings(records, spec))).toEqual([2, 3, 5]);
	});

	test("filtering is idempotent", () => {
		const once = filterListings(records, spec);
		const twice = filterListings(once, spec);

		expect(twice).toEqual(once);
	});

	test("records are not mutated", () => {
		const frozen = records.map((r) => Object.freeze({ ...r }));

		const result = filterListings(frozen, spec);

		expect(result[0]).toBe(frozen[1]);
	});
});

// ============================================================================
// Spec Validation
// ============================================================================

describe("parseFilterSpec", () => {
	test("accepts a well-formed spec", () => {
		expect(parseFilterSpec({ minBedrooms: 2, requiredAmenities: ["pool"] })).toEqual({
			minBedrooms: 2,
			requiredAmenities: ["pool"],
		});
	});

	test("rejects inverted bounds", () => {
		expect(() => parseFilterSpec({ minBedrooms: 3, maxBedrooms: 2 })).toThrow(
			"Invalid filter spec: minBedrooms: minBedrooms must not exceed maxBedrooms",
		);
	});

	test("rejects unknown keys and negative bounds", () => {
		expect(() => parseFilterSpec({ bedrooms: 2 })).toThrow(InvalidSearchRequestError);
		expect(() => parseFilterSpec({ minPrice: -1 })).toThrow(InvalidSearchRequestError);
	});
});
