/**
 * URL Repository
 *
 * Durable store contract for URL records, and its PostgreSQL
 * implementation using raw parameterised SQL.
 *
 * Error contract:
 * - lookups by code throw NotFoundError when no row matches
 * - any driver failure is wrapped in StoreError (cause preserved)
 */

import { createLogger, type Logger } from "@shortkit/logger";
import { NotFoundError, StoreError, isShortkitError, type UrlRecord } from "@shortkit/shared";
import type { Queryable } from "./client.js";
import { checkDbConnection } from "./client.js";
import {
  URL_COLUMNS,
  toStoredUrlRecord,
  toUrlRecord,
  type InsertUrlResult,
  type StoredUrlRecord,
} from "./types.js";

// =============================================================================
// Contract
// =============================================================================

export interface UrlRepository {
  /**
   * Insert a record without a short code. When a record with the same
   * content hash exists and is no longer valid it is replaced under a new
   * id; when it is still valid it is returned with `created: false`.
   */
  insert(contentHash: string, destinationUrl: string, expiresAt: Date | null): Promise<InsertUrlResult>;

  findByHash(contentHash: string): Promise<StoredUrlRecord | null>;

  /** @throws NotFoundError */
  findByCode(shortCode: string): Promise<UrlRecord>;

  /** @throws NotFoundError when the id no longer exists */
  setCode(id: bigint, shortCode: string): Promise<void>;

  /** Add reconciled clicks. Returns the number of rows updated (0 or 1). */
  addClicks(shortCode: string, count: number): Promise<number>;

  /** @throws NotFoundError */
  getByCode(shortCode: string): Promise<UrlRecord>;

  ping(): Promise<boolean>;
}

// =============================================================================
// SQL Queries
// =============================================================================

/**
 * Upsert on the content hash. The DO UPDATE branch only fires for an
 * invalid row: it takes a fresh id, clears the code and resets the record.
 * A valid conflicting row makes the statement return nothing.
 */
const INSERT_QUERY = `
  INSERT INTO urls (url_hash, original_url, expires_at)
  VALUES ($1, $2, $3)
  ON CONFLICT (url_hash) DO UPDATE
    SET id           = nextval(pg_get_serial_sequence('urls', 'id')),
        short_code   = NULL,
        original_url = EXCLUDED.original_url,
        click_count  = 0,
        created_at   = NOW(),
        updated_at   = NOW(),
        expires_at   = EXCLUDED.expires_at,
        is_active    = TRUE
    WHERE urls.is_active = FALSE
       OR (urls.expires_at IS NOT NULL AND urls.expires_at <= NOW())
  RETURNING ${URL_COLUMNS}
`;

const FIND_BY_HASH_QUERY = `
  SELECT ${URL_COLUMNS}
  FROM urls
  WHERE url_hash = $1
  LIMIT 1
`;

const FIND_BY_CODE_QUERY = `
  SELECT ${URL_COLUMNS}
  FROM urls
  WHERE short_code = $1
  LIMIT 1
`;

const SET_CODE_QUERY = `
  UPDATE urls
  SET short_code = $2, updated_at = NOW()
  WHERE id = $1
`;

const ADD_CLICKS_QUERY = `
  UPDATE urls
  SET click_count = click_count + $2, updated_at = NOW()
  WHERE short_code = $1
`;

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

export interface PostgresUrlRepositoryOptions {
  logger?: Logger;
}

export class PostgresUrlRepository implements UrlRepository {
  private readonly db: Queryable;
  private readonly log: Logger;

  constructor(db: Queryable, options: PostgresUrlRepositoryOptions = {}) {
    this.db = db;
    this.log = options.logger ?? createLogger("url-repository");
  }

  async insert(contentHash: string, destinationUrl: string, expiresAt: Date | null): Promise<InsertUrlResult> {
    const result = await this.run("insert url", INSERT_QUERY, [contentHash, destinationUrl, expiresAt]);
    const [row] = result.rows;
    if (row) {
      return { created: true, record: toStoredUrlRecord(row) };
    }

    // Conflict with a still-valid row
    const existing = await this.findByHash(contentHash);
    if (!existing) {
      throw new StoreError(`Insert conflict on ${contentHash} but no row found`);
    }
    return { created: false, record: existing };
  }

  async findByHash(contentHash: string): Promise<StoredUrlRecord | null> {
    const result = await this.run("find url by hash", FIND_BY_HASH_QUERY, [contentHash]);
    const [row] = result.rows;
    return row ? toStoredUrlRecord(row) : null;
  }

  async findByCode(shortCode: string): Promise<UrlRecord> {
    return this.selectByCode("find url by code", shortCode);
  }

  async getByCode(shortCode: string): Promise<UrlRecord> {
    return this.selectByCode("get url by code", shortCode);
  }

  async setCode(id: bigint, shortCode: string): Promise<void> {
    const result = await this.run("set short code", SET_CODE_QUERY, [id.toString(), shortCode]);
    if (result.rowCount === 0) {
      throw new NotFoundError(`No url with id ${id}`);
    }
  }

  async addClicks(shortCode: string, count: number): Promise<number> {
    const result = await this.run("add clicks", ADD_CLICKS_QUERY, [shortCode, count]);
    return result.rowCount ?? 0;
  }

  async ping(): Promise<boolean> {
    return checkDbConnection(this.db);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async selectByCode(operation: string, shortCode: string): Promise<UrlRecord> {
    const result = await this.run(operation, FIND_BY_CODE_QUERY, [shortCode]);
    const [row] = result.rows;
    const record = row ? toUrlRecord(toStoredUrlRecord(row)) : null;
    if (!record) {
      throw new NotFoundError();
    }
    return record;
  }

  private async run(operation: string, text: string, values: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (err) {
      if (isShortkitError(err)) throw err;
      this.log.error({ err, operation }, "Query failed");
      throw new StoreError(`Failed to ${operation}`, err);
    }
  }
}
