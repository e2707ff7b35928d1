import { z } from "zod";

const nameList = z.union([z.string(), z.array(z.string())]);
const databaseName = z.string().trim().min(1, "database name is required");
const port = z.coerce.number().int().positive();

/**
 * Flat database.yml-style record with snake_case keys.
 */
export const legacyConfigSchema = z
  .object({
    adapter: z.string().optional(),
    database: databaseName,
    host: z.string().optional(),
    port: port.optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    su_username: z.string().optional(),
    su_password: z.string().optional(),
    encoding: z.string().optional(),
    collation: z.string().optional(),
    ctype: z.string().optional(),
    template: z.string().optional(),
    tablespace: z.string().optional(),
    connection_limit: z.number().int().optional(),
    schema_search_path: nameList.optional(),
    postgis_extension: nameList.optional(),
    postgis_schema: z.string().optional(),
    /** Seconds, as libpq reads it. */
    connect_timeout: z.number().positive().optional(),
    /** Milliseconds, as the server reads it. */
    statement_timeout: z.number().int().positive().optional(),
  })
  .passthrough();

export type LegacyConfig = z.infer<typeof legacyConfigSchema>;

const credentials = z.object({
  username: z.string().optional(),
  password: z.string().optional(),
});

/**
 * TypeORM DataSourceOptions record with a nested `postgis` block.
 */
export const dataSourceConfigSchema = z
  .object({
    type: z.literal("postgres"),
    database: databaseName,
    host: z.string().optional(),
    port: port.optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    schema: z.string().optional(),
    connectTimeoutMS: z.number().int().positive().optional(),
    postgis: z
      .object({
        superuser: credentials.optional(),
        extensions: nameList.optional(),
        extensionSchema: z.string().optional(),
        searchPath: nameList.optional(),
        encoding: z.string().optional(),
        collation: z.string().optional(),
        ctype: z.string().optional(),
        template: z.string().optional(),
        tablespace: z.string().optional(),
        connectionLimit: z.number().int().optional(),
        statementTimeoutMS: z.number().int().positive().optional(),
      })
      .default({}),
  })
  .passthrough();

export type DataSourceConfig = z.infer<typeof dataSourceConfigSchema>;
