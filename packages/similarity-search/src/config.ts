/**
 * Search Configuration
 *
 * Process-wide settings, validated once and frozen. Nothing here changes
 * per request.
 */

import { z } from "zod";
import { LOG_LEVELS } from "./diagnostics";
import { InvalidConfigError } from "./errors";
import { validateWeightProfile } from "./query/weight-profiles";

// ==========================================
// ZOD SCHEMAS
// ==========================================

export const WeightProfileSchema = z.record(z.string(), z.number());

export const SearchConfigSchema = z.object({
	/** RRF smoothing constant */
	rrfK: z.number().finite().nonnegative().default(60),
	/** Neighbors requested per facet = topK × overFetchFactor */
	overFetchFactor: z.number().int().min(1).default(2),
	/** Fused IDs hydrated = topK × hydrationFactor */
	hydrationFactor: z.number().int().min(1).default(5),
	defaultTopK: z.number().int().min(1).default(10),
	/** Timeout applied to each vector-store / record-store call */
	collaboratorTimeoutMs: z.number().int().positive().default(5000),
	logLevel: z.enum(LOG_LEVELS).default("info"),
	/** Extra (or overriding) weight profiles by name */
	profiles: z.record(z.string().min(1), WeightProfileSchema).default({}),
});

export type SearchConfigInput = z.input<typeof SearchConfigSchema>;

export type SearchConfig = Readonly<z.infer<typeof SearchConfigSchema>>;

// ==========================================
// PARSING
// ==========================================

/**
 * Validate configuration input. Throws InvalidConfigError for schema
 * violations and InvalidWeightError for out-of-range profile weights.
 */
export function parseSearchConfig(input: unknown = {}): SearchConfig {
	const result = SearchConfigSchema.safeParse(input);
	if (!result.success) {
		throw new InvalidConfigError(
			result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
		);
	}

	const profiles: Record<string, Record<string, number>> = {};
	for (const [name, profile] of Object.entries(result.data.profiles)) {
		profiles[name] = { ...validateWeightProfile(profile, name) };
	}

	return Object.freeze({ ...result.data, profiles: Object.freeze(profiles) });
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = parseSearchConfig();

const ENV_KEYS = {
	rrfK: "SIMILARITY_RRF_K",
	overFetchFactor: "SIMILARITY_OVER_FETCH",
	hydrationFactor: "SIMILARITY_HYDRATION_FACTOR",
	defaultTopK: "SIMILARITY_TOP_K",
	collaboratorTimeoutMs: "SIMILARITY_TIMEOUT_MS",
} as const;

/**
 * Build configuration from environment variables. Unset variables fall
 * back to defaults; set-but-invalid ones are rejected.
 */
export function loadSearchConfigFromEnv(
	env: Record<string, string | undefined> = process.env,
	overrides: SearchConfigInput = {},
): SearchConfig {
	const raw: Record<string, unknown> = {};

	for (const [key, envKey] of Object.entries(ENV_KEYS)) {
		const value = env[envKey]?.trim();
		if (value) raw[key] = Number(value);
	}

	const logLevel = env.SIMILARITY_LOG_LEVEL?.trim();
	if (logLevel) raw.logLevel = logLevel.toLowerCase();

	return parseSearchConfig({ ...raw, ...overrides });
}
