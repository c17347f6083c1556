/**
 * Collection Targets
 *
 * Fixed vocabularies, watchlist and endpoint parameters used by the
 * discovery strategies. Changing these changes what a dataset contains,
 * so they are versioned together with the output schema.
 *
 * @module config/targets
 */

/** Keywords searched by the keyword discovery strategy */
export const TARGET_KEYWORDS = [
  'Korean Skincare',
  'Glass Skin',
  'K-Beauty Routine',
  'Korean Beauty',
  'Korean Makeup',
  'Korean Cosmetics',
  'Tirtir',
  'Biodance',
  'Anua',
  'COSRX',
  'Some By Mi',
  'Beauty of Joseon',
  'Torriden',
  'Round Lab',
] as const;

/** Relevance vocabulary matched against title, description and tags */
export const RELEVANCE_VOCABULARY = [
  'makeup',
  'skincare',
  'beauty',
  'routine',
  'review',
  'tutorial',
  'haul',
  'unboxing',
  'korean',
  'k-beauty',
  'serum',
  'toner',
  'moisturizer',
  'cleanser',
  'sunscreen',
] as const;

/** Channels monitored by the watchlist performance strategy */
export const WATCHED_CHANNELS = [
  'UCdKuE7a2QZeHPhDntXVZ91w',
  'UCQhwBjjWuLrcE0tJOjq4rKw',
  'UC2sYit3cZ2B04MGgy0It6dQ',
  'UCsyn_0Fx8w8eZlASIUkamBg',
  'UCBJycsmduvYEL83R_U4JriQ',
] as const;

/**
 * Endpoint parameters shared by the strategies and the label oracle.
 */
export const COLLECTION_PARAMS = {
  /** Region for the most-popular chart */
  regionCode: 'US',
  /** Howto & Style */
  categoryId: '26',
  /** Page size for the most-popular chart */
  popularPageSize: 50,
  /** Search results per keyword */
  searchPageSize: 20,
  /** Search window in days */
  searchWindowDays: 7,
  /** Most recent uploads taken per watched channel */
  recentUploads: 10,
  /** Top-ranked comments fetched per item */
  maxComments: 30,
} as const;

/**
 * Strategy-level collection targets. Injected through the run context so
 * tests and alternative deployments can supply their own lists.
 */
export interface CollectionTargets {
  keywords: readonly string[];
  vocabulary: readonly string[];
  channels: readonly string[];
}

export const DEFAULT_TARGETS: CollectionTargets = {
  keywords: TARGET_KEYWORDS,
  vocabulary: RELEVANCE_VOCABULARY,
  channels: WATCHED_CHANNELS,
};
