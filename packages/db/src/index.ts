/**
 * @shortkit/db - Durable Store Package
 *
 * URL repository contract, its PostgreSQL and in-process implementations,
 * and pool lifecycle helpers.
 *
 * Usage:
 * ```ts
 * import { createPool, fromPool, instrument, PostgresUrlRepository } from "@shortkit/db";
 *
 * const pool = createPool({ connectionString: config.databaseUrl });
 * const urls = new PostgresUrlRepository(instrument(fromPool(pool)));
 * const record = await urls.getByCode("0000G7");
 * ```
 */

export * from "./client.js";
export * from "./types.js";
export * from "./repository.js";
export * from "./memory.js";
