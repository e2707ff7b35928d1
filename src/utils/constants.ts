/**
 * Shared constants for provisioning tasks.
 * 
 * @internal
 */
export const CONSTANTS = {
  /**
   * Maximum length for query preview in error messages.
   */
  QUERY_PREVIEW_MAX_LENGTH: 200,

  DEFAULT_HOST: "localhost",
  DEFAULT_PORT: 5432,
  DEFAULT_ENCODING: "utf8",

  /**
   * Database the admin connection attaches to; always present on a server.
   */
  MAINTENANCE_DATABASE: "postgres",

  DEFAULT_CONNECT_TIMEOUT_MS: 10_000,
  DEFAULT_STATEMENT_TIMEOUT_MS: 60_000,

  DEFAULT_EXTENSIONS: ["postgis"],

  TOPOLOGY_EXTENSION: "postgis_topology",
  TOPOLOGY_SCHEMA: "topology",

  /**
   * Search path forced on admin connections.
   */
  ADMIN_SEARCH_PATH: ["public"],

  /**
   * SQLSTATE duplicate_database.
   */
  DUPLICATE_DATABASE_SQLSTATE: "42P04",
} as const;
