import type { ConnectionDescriptor, ConnectionFactory, ProvisioningConfig, SqlConnection } from "../types";
import { ProvisioningConnectionError } from "../errors";
import { CONSTANTS } from "../utils/constants";

function superuserDescriptor(config: ProvisioningConfig, database: string): ConnectionDescriptor {
  return {
    host: config.host,
    port: config.port,
    database,
    username: config.superuserUsername,
    password: config.superuserPassword,
    searchPath: CONSTANTS.ADMIN_SEARCH_PATH,
    connectTimeoutMs: config.connectTimeoutMs,
    statementTimeoutMs: config.statementTimeoutMs,
  };
}

/**
 * Descriptor for the maintenance database, with superuser credentials.
 */
export function adminDescriptor(config: ProvisioningConfig): ConnectionDescriptor {
  return superuserDescriptor(config, config.maintenanceDatabase);
}

/**
 * Descriptor for the database being provisioned. Extension setup needs
 * the same privileges as creation, so it also runs as the superuser.
 */
export function targetDescriptor(config: ProvisioningConfig): ConnectionDescriptor {
  return superuserDescriptor(config, config.databaseName);
}

async function open(
  factory: ConnectionFactory,
  descriptor: ConnectionDescriptor
): Promise<SqlConnection> {
  try {
    return await factory.open(descriptor);
  } catch (error) {
    if (error instanceof ProvisioningConnectionError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProvisioningConnectionError(
      `Failed to connect to "${descriptor.database}" at ${descriptor.host}:${descriptor.port}: ${reason}`,
      descriptor.database,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Opens a privileged connection to the server's maintenance database.
 * Not retried.
 *
 * @throws {ProvisioningConnectionError}
 */
export function connectAsAdmin(
  factory: ConnectionFactory,
  config: ProvisioningConfig
): Promise<SqlConnection> {
  return open(factory, adminDescriptor(config));
}

/**
 * Opens a privileged connection to the target database.
 *
 * @throws {ProvisioningConnectionError}
 */
export function connectToTarget(
  factory: ConnectionFactory,
  config: ProvisioningConfig
): Promise<SqlConnection> {
  return open(factory, targetDescriptor(config));
}
