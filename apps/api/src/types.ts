/**
 * API Type Definitions
 */

import type { LogLevel } from "@shortkit/logger";

// =============================================================================
// Configuration
// =============================================================================

export interface RateLimitRule {
  /** Requests admitted per window */
  requests: number;
  /** Window length in ms */
  windowMs: number;
}

export type RateLimitScope = "default" | "create";

export interface Config {
  nodeEnv: string;

  // Server
  port: number;
  host: string;
  /** Prefix for generated short URLs */
  baseUrl: string;
  /** Addresses/CIDRs whose X-Forwarded-For is believed for the client IP */
  trustedProxies: string[];

  // Database
  databaseUrl: string;
  dbPoolMax: number;
  dbPoolMin: number;
  dbTimeoutMs: number;

  // Redis
  redisUrl: string;
  redisTimeoutMs: number;

  // Links
  cacheTtlSeconds: number;
  shortCodeLength: number;

  // Rate limiting
  rateLimits: Record<RateLimitScope, RateLimitRule>;

  // Click counting
  clickIncrementTimeoutMs: number;
  clickSyncIntervalMs: number;
  clickSyncTimeoutMs: number;

  // Logging
  logLevel: LogLevel;
}

// =============================================================================
// Rate Limiting
// =============================================================================

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  /** Requests still admitted in the current window */
  remaining: number;
  /** When a full window will have passed since this request */
  resetAt: Date;
  /** Seconds a rejected caller should wait */
  retryAfterSeconds: number;
  /** True when the decision was made without the backing store */
  degraded: boolean;
}
