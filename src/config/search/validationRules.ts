import { SEARCH_LIMITS, SEARCH_VALIDATION } from './constants';

export const SEARCH_RULES = {
  queryMinLength: 1,
  queryMaxLength: SEARCH_VALIDATION.queryMaxLength,
  limitMax: SEARCH_LIMITS.max,
  sourceMaxLength: SEARCH_VALIDATION.sourceMaxLength,
  ingestBatchMax: SEARCH_VALIDATION.ingestBatchMax
} as const;
