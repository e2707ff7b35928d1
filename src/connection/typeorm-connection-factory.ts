// TypeORM connection factory

import { DataSource } from "typeorm";
import type { PostgresConnectionOptions } from "typeorm/driver/postgres/PostgresConnectionOptions";
import type { ConnectionDescriptor, ConnectionFactory } from "../types";
import { ProvisioningConnectionError } from "../errors";
import { SqlBuilder } from "../utils/sql-builder";
import { TypeOrmConnection } from "./typeorm-connection";

/**
 * Maps a descriptor onto postgres DataSource options.
 * 
 * No entities, no synchronization and a pool of one: the DataSource is
 * only a carrier for raw DDL. The search path and statement timeout are
 * handed to pg, which sends them as startup parameters.
 * 
 * @param descriptor - Connection descriptor
 * @returns DataSource options for the postgres driver
 */
export function toDataSourceOptions(descriptor: ConnectionDescriptor): PostgresConnectionOptions {
  const searchPath = descriptor.searchPath
    .map((schema) => SqlBuilder.quoteIdentifier(schema).replace(/ /g, "\\ "))
    .join(",");

  return {
    type: "postgres",
    host: descriptor.host,
    port: descriptor.port,
    username: descriptor.username,
    password: descriptor.password,
    database: descriptor.database,
    applicationName: "postgis-tasks",
    connectTimeoutMS: descriptor.connectTimeoutMs,
    poolSize: 1,
    entities: [],
    synchronize: false,
    migrationsRun: false,
    logging: false,
    extra: {
      statement_timeout: descriptor.statementTimeoutMs,
      ...(searchPath ? { options: `-c search_path=${searchPath}` } : {}),
    },
  };
}

/**
 * Opens TypeORM-backed connections.
 * 
 * @public
 */
export class TypeOrmConnectionFactory implements ConnectionFactory {
  /**
   * Initializes a DataSource and takes one query runner from it.
   * 
   * @throws {ProvisioningConnectionError} On network, authentication or timeout failure
   */
  async open(descriptor: ConnectionDescriptor): Promise<TypeOrmConnection> {
    let dataSource: DataSource;
    try {
      dataSource = new DataSource(toDataSourceOptions(descriptor));
      await dataSource.initialize();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProvisioningConnectionError(
        `Failed to connect to "${descriptor.database}" at ${descriptor.host}:${descriptor.port}: ${reason}`,
        descriptor.database,
        error instanceof Error ? error : new Error(reason)
      );
    }

    const queryRunner = dataSource.createQueryRunner("master");
    return new TypeOrmConnection(dataSource, queryRunner, descriptor.database);
  }
}
