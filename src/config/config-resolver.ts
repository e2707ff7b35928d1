import type { z, ZodError, ZodTypeAny } from "zod";
import type { ConfigGeneration, ProvisioningConfig, RawConfig } from "../types";
import { InvalidConfigError } from "../errors";
import { CONSTANTS } from "../utils/constants";
import { ProvisioningGuards } from "../utils/guards";
import { normalizeExtensionList, normalizeNameList, resolveSuperuser } from "./normalize";
import {
  dataSourceConfigSchema,
  legacyConfigSchema,
  type DataSourceConfig,
  type LegacyConfig,
} from "./schemas";

/**
 * Turns one configuration generation into a ProvisioningConfig.
 */
export interface ConfigStrategy {
  readonly generation: ConfigGeneration;
  matches(raw: RawConfig): boolean;
  resolve(raw: RawConfig): ProvisioningConfig;
}

function parseWith<S extends ZodTypeAny>(
  schema: S,
  raw: RawConfig,
  generation: ConfigGeneration
): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw toInvalidConfig(parsed.error, generation);
  }
  return parsed.data;
}

function toInvalidConfig(error: ZodError, generation: ConfigGeneration): InvalidConfigError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return new InvalidConfigError(
    `Invalid ${generation} configuration: ${issues.join("; ")}`,
    issues,
    { generation }
  );
}

export const dataSourceStrategy: ConfigStrategy = {
  generation: "data-source",

  matches(raw) {
    return "type" in raw;
  },

  resolve(raw) {
    const options: DataSourceConfig = parseWith(dataSourceConfigSchema, raw, "data-source");
    const postgis = options.postgis;
    const searchPath = postgis.searchPath ?? options.schema;

    return {
      databaseName: options.database,
      host: options.host ?? CONSTANTS.DEFAULT_HOST,
      port: options.port ?? CONSTANTS.DEFAULT_PORT,
      ownerUsername: options.username,
      ownerPassword: options.password,
      ...resolveSuperuser(
        { username: options.username, password: options.password },
        postgis.superuser ?? {}
      ),
      encoding: postgis.encoding ?? CONSTANTS.DEFAULT_ENCODING,
      collation: postgis.collation,
      ctype: postgis.ctype,
      template: postgis.template,
      tablespace: postgis.tablespace,
      connectionLimit: postgis.connectionLimit,
      schemaSearchPath: searchPath === undefined ? [] : normalizeNameList(searchPath),
      extensions: postgis.extensions === undefined
        ? [...CONSTANTS.DEFAULT_EXTENSIONS]
        : normalizeExtensionList(postgis.extensions),
      extensionSchema: postgis.extensionSchema,
      maintenanceDatabase: CONSTANTS.MAINTENANCE_DATABASE,
      connectTimeoutMs: options.connectTimeoutMS ?? CONSTANTS.DEFAULT_CONNECT_TIMEOUT_MS,
      statementTimeoutMs: postgis.statementTimeoutMS ?? CONSTANTS.DEFAULT_STATEMENT_TIMEOUT_MS,
    };
  },
};

export const legacyStrategy: ConfigStrategy = {
  generation: "legacy",

  matches() {
    return true;
  },

  resolve(raw) {
    const options: LegacyConfig = parseWith(legacyConfigSchema, raw, "legacy");

    return {
      databaseName: options.database,
      host: options.host ?? CONSTANTS.DEFAULT_HOST,
      port: options.port ?? CONSTANTS.DEFAULT_PORT,
      ownerUsername: options.username,
      ownerPassword: options.password,
      ...resolveSuperuser(
        { username: options.username, password: options.password },
        { username: options.su_username, password: options.su_password }
      ),
      encoding: options.encoding ?? CONSTANTS.DEFAULT_ENCODING,
      collation: options.collation,
      ctype: options.ctype,
      template: options.template,
      tablespace: options.tablespace,
      connectionLimit: options.connection_limit,
      schemaSearchPath: options.schema_search_path === undefined
        ? []
        : normalizeNameList(options.schema_search_path),
      extensions: options.postgis_extension === undefined
        ? [...CONSTANTS.DEFAULT_EXTENSIONS]
        : normalizeExtensionList(options.postgis_extension),
      extensionSchema: options.postgis_schema,
      maintenanceDatabase: CONSTANTS.MAINTENANCE_DATABASE,
      connectTimeoutMs: options.connect_timeout === undefined
        ? CONSTANTS.DEFAULT_CONNECT_TIMEOUT_MS
        : Math.round(options.connect_timeout * 1000),
      statementTimeoutMs: options.statement_timeout ?? CONSTANTS.DEFAULT_STATEMENT_TIMEOUT_MS,
    };
  },
};

const STRATEGIES: readonly ConfigStrategy[] = [dataSourceStrategy, legacyStrategy];

/**
 * Detects which generation a raw record belongs to.
 */
export function detectGeneration(raw: RawConfig): ConfigGeneration {
  return selectStrategy(raw).generation;
}

function selectStrategy(raw: RawConfig): ConfigStrategy {
  const strategy = STRATEGIES.find((candidate) => candidate.matches(raw));
  return strategy ?? legacyStrategy;
}

/**
 * Resolves a raw configuration record into a frozen ProvisioningConfig.
 *
 * @throws {InvalidConfigError} If the record is not an object, lacks a
 * database name, or has fields of the wrong type
 */
export function resolveConfig(raw: unknown): ProvisioningConfig {
  if (!ProvisioningGuards.isRecord(raw)) {
    throw new InvalidConfigError("Configuration must be an object", ["(root)"], {
      received: Array.isArray(raw) ? "array" : typeof raw,
    });
  }

  const config = selectStrategy(raw).resolve(raw);
  return Object.freeze({
    ...config,
    schemaSearchPath: Object.freeze([...config.schemaSearchPath]),
    extensions: Object.freeze([...config.extensions]),
  });
}
