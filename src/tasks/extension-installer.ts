import type { Logger } from "pino";
import type { ProvisioningConfig, SqlConnection } from "../types";
import { CONSTANTS } from "../utils/constants";
import { ProvisioningGuards } from "../utils/guards";
import { SqlBuilder } from "../utils/sql-builder";
import { executeStatement } from "./execute";

/**
 * Whether `schema` is present in the target database's catalog.
 */
export async function schemaExists(target: SqlConnection, schema: string): Promise<boolean> {
  const probe = SqlBuilder.schemaExists(schema);
  const rows = await executeStatement(target, probe.text, probe.parameters);
  return rows.length > 0;
}

async function ensureSchema(target: SqlConnection, schema: string, logger?: Logger): Promise<void> {
  if (await schemaExists(target, schema)) {
    return;
  }
  await executeStatement(target, SqlBuilder.createSchema(schema));
  await executeStatement(target, SqlBuilder.grantSchemaToPublic(schema));
  logger?.info({ schema }, "created extension schema");
}

/**
 * Installs the configured extensions into the target database, in order.
 *
 * postgis_topology always goes to the fixed `topology` schema. Other
 * extensions go to `extensionSchema` when one is configured (created
 * and granted to PUBLIC if missing), otherwise to the default schema.
 * Every statement is IF NOT EXISTS, so re-running is a no-op.
 *
 * @throws {SchemaSearchPathError} Before any statement, if topology is
 * requested without `topology` on the search path
 * @throws {SqlExecutionError}
 */
export async function installExtensions(
  target: SqlConnection,
  config: ProvisioningConfig,
  logger?: Logger
): Promise<void> {
  ProvisioningGuards.assertSearchPathCoversExtensions(config);

  for (const extension of config.extensions) {
    if (extension === CONSTANTS.TOPOLOGY_EXTENSION) {
      await executeStatement(
        target,
        SqlBuilder.createExtension(extension, CONSTANTS.TOPOLOGY_SCHEMA, "schema")
      );
      logger?.info({ extension, schema: CONSTANTS.TOPOLOGY_SCHEMA }, "extension installed");
      continue;
    }

    const schema = config.extensionSchema;
    if (schema) {
      await ensureSchema(target, schema, logger);
      await executeStatement(target, SqlBuilder.createExtension(extension, schema, "with_schema"));
    } else {
      await executeStatement(target, SqlBuilder.createExtension(extension));
    }
    logger?.info({ extension, schema: schema ?? null }, "extension installed");
  }
}
