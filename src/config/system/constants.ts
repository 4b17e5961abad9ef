export const RATE_LIMIT_ALLOWLIST = ['127.0.0.1', '::1'];

export const ROUTE_RATE_LIMITS = {
  search: { max: 30, timeWindow: '1 minute' },
  ingest: { max: 10, timeWindow: '1 minute' },
  admin: { max: 5, timeWindow: '1 minute' }
};

export const DB_POOL = {
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000
};
