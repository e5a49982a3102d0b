/**
 * Cache Tier Contract
 * @module cache/cache-tier
 *
 * Uniform get/set/delete/scan-delete contract shared by the local in-process
 * tier and the distributed tier. Tier calls never throw: failures come back
 * as `tierFailed` results so fallback is ordinary control flow in the gateway.
 */

// ============================================================================
// Tier Identity
// ============================================================================

export const CacheTierNames = {
  MEMORY: 'memory',
  DISTRIBUTED: 'distributed',
} as const;

export type CacheTierName = typeof CacheTierNames[keyof typeof CacheTierNames];

// ============================================================================
// Tier Results
// ============================================================================

export type TierReadResult =
  | { readonly found: true; readonly value: string; readonly tierFailed: false; readonly remainingTtlSeconds?: number }
  | { readonly found: false; readonly tierFailed: false }
  | { readonly found: false; readonly tierFailed: true; readonly error: Error };

export type TierWriteResult =
  | { readonly ok: true; readonly tierFailed: false }
  | { readonly ok: false; readonly tierFailed: true; readonly error: Error };

export type TierDeleteResult =
  | { readonly deleted: number; readonly tierFailed: false }
  | { readonly deleted: 0; readonly tierFailed: true; readonly error: Error };

export const TierResults = {
  hit(value: string, remainingTtlSeconds?: number): TierReadResult {
    return { found: true, value, tierFailed: false, remainingTtlSeconds };
  },
  miss(): TierReadResult {
    return { found: false, tierFailed: false };
  },
  readFailed(error: Error): TierReadResult {
    return { found: false, tierFailed: true, error };
  },
  written(): TierWriteResult {
    return { ok: true, tierFailed: false };
  },
  writeFailed(error: Error): TierWriteResult {
    return { ok: false, tierFailed: true, error };
  },
  deleted(count: number): TierDeleteResult {
    return { deleted: count, tierFailed: false };
  },
  deleteFailed(error: Error): TierDeleteResult {
    return { deleted: 0, tierFailed: true, error };
  },
};

// ============================================================================
// Tier Interface
// ============================================================================

export interface CacheTier {
  readonly name: CacheTierName;
  /** Serialized value lookup */
  get(key: string): Promise<TierReadResult>;
  set(key: string, serialized: string, ttlSeconds: number): Promise<TierWriteResult>;
  /** Removing an absent key is a successful write */
  delete(key: string): Promise<TierWriteResult>;
  /** Delete every key matching a validated glob pattern */
  deleteByPattern(pattern: string): Promise<TierDeleteResult>;
  /** Remove every key this tier owns */
  clear(): Promise<TierDeleteResult>;
  /** Reachability check */
  ping(): Promise<boolean>;
}
