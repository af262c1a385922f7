/**
 * Query module exports
 */

export {
	BUILT_IN_PROFILES,
	SEARCH_MODES,
	createWeightProfileRegistry,
	validateWeightProfile,
	type SearchMode,
	type WeightProfileRegistry,
} from "./weight-profiles";

export {
	DEFAULT_RRF_K,
	contributingFacets,
	fuseWeightedRrf,
	rrfContribution,
	type RrfFusionOptions,
} from "./rrf-fusion";

export {
	FilterSpecSchema,
	filterListings,
	matchesFilterSpec,
	parseFilterSpec,
	parsePriceRange,
	readPriceRange,
	type FilterRejection,
	type FilterVerdict,
	type ListingFilterOptions,
} from "./listing-filter";

export {
	CollaboratorTimeoutError,
	callWithTimeout,
	fanOut,
	type CollaboratorCall,
	type FanOutOptions,
} from "./fan-out";

export {
	createSimilaritySearch,
	type SearchCallOptions,
	type SimilaritySearch,
	type SimilaritySearchDeps,
} from "./similarity-search";
