/** Hex SHA-256 of the raw image bytes. */
export type ContentHash = string;

/** Hex SHA-256 of the canonicalized recognition parameters. */
export type ParamsDigest = string;

export type RecognitionParams = Readonly<Record<string, unknown>>;

export interface CacheKey {
  contentHash: ContentHash;
  challengeType: string;
}

export interface CacheEntry {
  result: string;
  paramsDigest: ParamsDigest;
  createdAt: number;
  lastAccessAt: number;
}

export interface CacheStats {
  total: number;
  expired: number;
  active: number;
  maxSize: number;
  ttlMs: number;
}

export interface ResultCacheOptions {
  maxSize: number;
  ttlMs: number;
  /** Clock in epoch milliseconds; injected by tests. */
  now?: () => number;
  /** Receives anomalies found in stored entries (they are dropped and reported as misses). */
  onAnomaly?: (message: string, key: CacheKey) => void;
}
