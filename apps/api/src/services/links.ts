/**
 * Link Service
 *
 * Cache-aside resolver for short URLs.
 *
 *   create   ──▶ validate ──▶ dedup by content hash ──▶ insert ──▶ assign code ──▶ warm cache
 *   resolve  ──▶ cache ──hit──▶ validity check ──▶ count click
 *                  └──miss/degraded──▶ durable store ──▶ validity check ──▶ warm cache, count click
 *   getStats ──▶ durable store + pending clicks
 *
 * The durable store is authoritative: its failures surface as StoreError.
 * Cache writes and click increments run in the background and never fail
 * a request; `settle()` waits for them (shutdown, tests).
 */

import { createLogger, type Logger } from "@shortkit/logger";
import type { UrlCache } from "@shortkit/cache";
import type { UrlRepository, StoredUrlRecord } from "@shortkit/db";
import type { ClickAggregator } from "@shortkit/analytics";
import {
  NotFoundError,
  ExpiredError,
  StoreError,
  ValidationError,
  SHORTCODE_CONFIG,
  URL_CONFIG,
  computeContentHash,
  isRecordValid,
  isShortCodeFormat,
  parseDuration,
  toShortCode,
  validateDestinationUrl,
  type CreateShortUrlInput,
  type CreateShortUrlResult,
  type UrlRecord,
  type UrlStats,
} from "@shortkit/shared";

// ============================================================================
// Types
// ============================================================================

export interface LinkServiceDeps {
  repository: UrlRepository;
  cache: UrlCache;
  clicks: ClickAggregator;
  /** Prefix for short URLs, without trailing slash */
  baseUrl: string;
  /** Minimum short code length (default: 6) */
  shortCodeLength?: number;
  logger?: Logger;
  /** Clock (default: () => new Date()) */
  now?: () => Date;
}

// ============================================================================
// Link Service
// ============================================================================

export class LinkService {
  private readonly repository: UrlRepository;
  private readonly cache: UrlCache;
  private readonly clicks: ClickAggregator;
  private readonly baseUrl: string;
  private readonly shortCodeLength: number;
  private readonly log: Logger;
  private readonly now: () => Date;

  /** Background cache writes and click increments still running */
  private readonly pending = new Set<Promise<unknown>>();

  constructor(deps: LinkServiceDeps) {
    this.repository = deps.repository;
    this.cache = deps.cache;
    this.clicks = deps.clicks;
    this.baseUrl = deps.baseUrl;
    this.shortCodeLength = deps.shortCodeLength ?? SHORTCODE_CONFIG.MIN_LENGTH;
    this.log = deps.logger ?? createLogger("link-service");
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Create a short URL, or return the existing one for the same destination.
   *
   * @throws ValidationError for a bad URL or expiry, before any store access
   * @throws StoreError when the durable store fails
   */
  async create(input: CreateShortUrlInput): Promise<CreateShortUrlResult> {
    const validation = validateDestinationUrl(input.url);
    if (!validation.valid) {
      const message = validation.error ?? "Invalid URL";
      throw new ValidationError(message, { url: [message] });
    }

    const now = this.now();
    const expiresAt = this.resolveExpiry(input.expiresIn, now);
    const contentHash = computeContentHash(input.url);

    const existing = await this.repository.findByHash(contentHash);
    if (existing && isRecordValid(existing, now)) {
      const record = await this.ensureCode(existing);
      this.log.debug({ shortCode: record.shortCode }, "Deduplicated short URL");
      return this.toCreateResult(record);
    }

    const { created, record: stored } = await this.repository.insert(contentHash, input.url, expiresAt);
    const record = await this.ensureCode(stored);

    if (created) {
      this.background(this.cache.put(record, now));
      this.log.info({ shortCode: record.shortCode, id: record.id.toString() }, "Short URL created");
    }

    return this.toCreateResult(record);
  }

  /**
   * Resolve a short code to its destination and count the click.
   *
   * @throws NotFoundError when no record exists
   * @throws ExpiredError when the record is inactive or past its expiry
   * @throws StoreError when the durable store fails on a cache miss
   */
  async resolve(shortCode: string): Promise<string> {
    if (!isShortCodeFormat(shortCode)) {
      throw new NotFoundError();
    }

    const now = this.now();
    const cached = await this.cache.get(shortCode);

    if (!cached.degraded && cached.value) {
      if (!isRecordValid(cached.value, now)) {
        throw new ExpiredError();
      }
      this.countClick(shortCode);
      return cached.value.destinationUrl;
    }

    const record = await this.repository.findByCode(shortCode);
    if (!isRecordValid(record, now)) {
      throw new ExpiredError();
    }

    this.background(this.cache.put(record, now));
    this.countClick(shortCode);
    return record.destinationUrl;
  }

  /**
   * Reconciled clicks plus clicks still pending in the fast store.
   *
   * @throws NotFoundError when no record exists
   */
  async getStats(shortCode: string): Promise<UrlStats> {
    if (!isShortCodeFormat(shortCode)) {
      throw new NotFoundError();
    }

    const record = await this.repository.getByCode(shortCode);
    const pending = await this.clicks.pending(shortCode);

    let totalClicks = record.clickCount;
    if (pending.degraded) {
      this.log.warn({ shortCode, err: pending.error.message }, "Pending clicks unavailable; reporting durable count");
    } else {
      totalClicks += pending.value;
    }

    return {
      shortCode: record.shortCode,
      destinationUrl: record.destinationUrl,
      totalClicks,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
      active: record.active,
    };
  }

  /**
   * Wait for background cache writes and click increments.
   */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private resolveExpiry(expiresIn: string | undefined, now: Date): Date | null {
    if (expiresIn === undefined || expiresIn === "") return null;

    let ms: number;
    try {
      ms = parseDuration(expiresIn);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(err.message, { expires_in: [err.message] });
      }
      throw err;
    }

    if (ms <= 0) {
      throw new ValidationError("Expiry must be a positive duration", { expires_in: ["Must be positive"] });
    }
    if (ms > URL_CONFIG.MAX_LIFETIME_MS) {
      throw new ValidationError("Expiry must be at most 3650 days", { expires_in: ["Must be at most 3650d"] });
    }
    return new Date(now.getTime() + ms);
  }

  /**
   * Assign the short code derived from the record's id if the insert left
   * it unset. Derivation is deterministic, so concurrent callers agree.
   */
  private async ensureCode(record: StoredUrlRecord): Promise<UrlRecord> {
    if (record.shortCode !== null) {
      return { ...record, shortCode: record.shortCode };
    }

    const shortCode = toShortCode(record.id, this.shortCodeLength);
    try {
      await this.repository.setCode(record.id, shortCode);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new StoreError(`Record ${record.id} disappeared before its short code was assigned`, err);
      }
      throw err;
    }
    return { ...record, shortCode };
  }

  private toCreateResult(record: UrlRecord): CreateShortUrlResult {
    return {
      shortCode: record.shortCode,
      shortUrl: `${this.baseUrl}/${record.shortCode}`,
      destinationUrl: record.destinationUrl,
      expiresAt: record.expiresAt,
    };
  }

  private countClick(shortCode: string): void {
    this.background(this.clicks.increment(shortCode));
  }

  /**
   * Track a best-effort task. Its callers already log failures.
   */
  private background(task: Promise<unknown>): void {
    const tracked = task
      .catch((err: unknown) => {
        this.log.warn({ err }, "Background task failed");
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
