import type { LogLevelDesc } from 'loglevel';

/**
 * Context IRI given to quadruples that arrive without one, unless the
 * configuration says otherwise.
 */
export const DEFAULT_CONTEXT = 'urn:x-quads:default';

/**
 * Quadruple store configuration, shared by the store and its executors.
 *
 * @category Configuration
 */
export interface QuadStoreConfig {
  /**
   * The local identity of an executor, used for logging. For convenience, you
   * can use the {@link uuid} function. If not given, one is generated.
   */
  '@id'?: string;
  /**
   * Log level for executors. Default is `warn`.
   * @see https://github.com/pimterry/loglevel#documentation
   */
  logLevel?: LogLevelDesc;
  /**
   * Context IRI stamped onto quadruples that are added or merged from the
   * default graph. Default is {@link DEFAULT_CONTEXT}.
   */
  defaultContext?: string;
}

/**
 * SQLite executor configuration.
 *
 * @category Configuration
 */
export interface SqliteConfig extends QuadStoreConfig {
  /**
   * Database file path. Use `':memory:'` for a transient in-memory database.
   */
  path: string;
  /**
   * How long, in milliseconds, a statement waits for a locked database before
   * failing. Default is two minutes.
   * @default 120000
   */
  timeout?: number;
  /**
   * Opens the database read-only. The schema is then expected to exist.
   */
  readonly?: boolean;
}
