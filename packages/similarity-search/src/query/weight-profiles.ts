/**
 * Facet Weight Profiles
 *
 * Named search modes mapping each facet to a weight. Profiles are validated
 * once when the registry is built and frozen afterwards; requests only look
 * them up.
 */

import { InvalidWeightError, UnknownSearchModeError } from "../errors";
import { FACETS, isFacet, type WeightProfile } from "../types";

// ============================================================================
// Built-in Profiles
// ============================================================================

export const SEARCH_MODES = ["balanced", "visual_focus", "features_focus", "location_focus"] as const;

export type SearchMode = (typeof SEARCH_MODES)[number];

export const BUILT_IN_PROFILES: Readonly<Record<SearchMode, WeightProfile>> = Object.freeze({
	balanced: Object.freeze({ location: 0.4, features: 0.4, visual: 0.2 }),
	visual_focus: Object.freeze({ location: 0.1, features: 0.1, visual: 0.8 }),
	features_focus: Object.freeze({ location: 0.1, features: 0.8, visual: 0.1 }),
	location_focus: Object.freeze({ location: 0.8, features: 0.1, visual: 0.1 }),
});

// ============================================================================
// Validation
// ============================================================================

/**
 * Throws InvalidWeightError for unknown facets and for weights that are
 * negative, above 1 or not finite. Returns a frozen copy.
 */
export function validateWeightProfile(
	profile: Readonly<Record<string, number>>,
	name?: string,
): WeightProfile {
	const validated: Partial<Record<(typeof FACETS)[number], number>> = {};

	for (const [facet, weight] of Object.entries(profile)) {
		if (!isFacet(facet)) {
			throw new InvalidWeightError(facet, weight, name);
		}
		if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
			throw new InvalidWeightError(facet, weight, name);
		}
		validated[facet] = weight;
	}

	return Object.freeze(validated);
}

// ============================================================================
// Registry
// ============================================================================

export interface WeightProfileRegistry {
	/** Throws UnknownSearchModeError for unregistered names */
	resolve(name: string): WeightProfile;
	has(name: string): boolean;
	names(): string[];
}

/**
 * Build a registry of the built-in profiles plus any custom ones.
 * A custom profile with a built-in name replaces the built-in.
 */
export function createWeightProfileRegistry(
	custom: Readonly<Record<string, Readonly<Record<string, number>>>> = {},
): WeightProfileRegistry {
	const profiles = new Map<string, WeightProfile>(Object.entries(BUILT_IN_PROFILES));

	for (const [name, profile] of Object.entries(custom)) {
		profiles.set(name, validateWeightProfile(profile, name));
	}

	return {
		resolve(name: string): WeightProfile {
			const profile = profiles.get(name);
			if (!profile) {
				throw new UnknownSearchModeError(name, [...profiles.keys()]);
			}
			return profile;
		},

		has(name: string): boolean {
			return profiles.has(name);
		},

		names(): string[] {
			return [...profiles.keys()];
		},
	};
}
