export const SEARCH_LIMITS = {
  default: 10,
  max: 50
};

export const SEARCH_VALIDATION = {
  queryMaxLength: 500,
  sourceMaxLength: 100,
  ingestBatchMax: 500
};

export const SNIPPET = {
  maxLength: 180,
  leadingContext: 40
};

export const SESSION_DEFAULTS = {
  maxEntries: 1_000,
  ttlMs: 6 * 60 * 60 * 1000,
  keyLength: 8
};

export const SOURCE_LOOKUP = {
  maxCandidates: 20
};
