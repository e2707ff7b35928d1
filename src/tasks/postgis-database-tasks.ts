// PostGIS database tasks

import type { Logger } from "pino";
import type {
  ConnectionFactory,
  ProvisioningConfig,
  ProvisioningResult,
  ProvisioningState,
} from "../types";
import { DatabaseAlreadyExistsError } from "../errors";
import { TypeOrmConnectionFactory } from "../connection/typeorm-connection-factory";
import { withConnection } from "../connection/scoped";
import { makeLogger } from "../logging/logger";
import { ProvisioningGuards } from "../utils/guards";
import { connectAsAdmin, connectToTarget } from "./admin-connector";
import { createDatabase, dropDatabase } from "./database-creator";
import { installExtensions } from "./extension-installer";
import {
  ExecFileCommandRunner,
  structureDump,
  structureLoad,
  type CommandRunner,
} from "./structure-tasks";

/**
 * Collaborators a tasks instance works with. All optional; defaults open
 * TypeORM connections, shell out with execFile, and log through pino.
 * 
 * @public
 */
export interface DatabaseTasksOptions {
  connectionFactory?: ConnectionFactory;
  commandRunner?: CommandRunner;
  logger?: Logger;
  /** Called on every state change of `create()`. */
  onTransition?: (state: ProvisioningState) => void;
}

export interface CreateOptions {
  /**
   * Throw DatabaseAlreadyExistsError instead of continuing with
   * extension setup when the database is already there.
   */
  failIfExists?: boolean;
}

/**
 * Database-level tasks for one configured database.
 * 
 * @public
 */
export interface DatabaseTasks {
  readonly config: ProvisioningConfig;
  create(options?: CreateOptions): Promise<ProvisioningResult>;
  setupGis(): Promise<void>;
  drop(): Promise<void>;
  structureDump(filename: string): Promise<void>;
  structureLoad(filename: string): Promise<void>;
}

/**
 * Constructor shape the task registry stores.
 * 
 * @public
 */
export type DatabaseTasksClass = new (
  config: ProvisioningConfig,
  options?: DatabaseTasksOptions
) => DatabaseTasks;

/**
 * Creates PostGIS-enabled databases.
 * 
 * `create()` walks start → admin_connected → database_created or
 * database_exists → target_connected → extensions_installed → done.
 * An existing database still gets its extensions, so provisioning can be
 * re-run. Each phase owns its connection and closes it before the next
 * phase opens one.
 * 
 * @example
 * ```typescript
 * const tasks = new PostgisDatabaseTasks(resolveConfig({
 *   database: "geo_db",
 *   username: "app",
 *   su_username: "postgres",
 *   postgis_extension: "postgis,postgis_topology",
 *   schema_search_path: "public,topology",
 * }));
 * const result = await tasks.create();
 * ```
 * 
 * @public
 */
export class PostgisDatabaseTasks implements DatabaseTasks {
  readonly config: ProvisioningConfig;
  private readonly connectionFactory: ConnectionFactory;
  private readonly commandRunner: CommandRunner;
  private readonly logger: Logger;
  private readonly onTransition?: (state: ProvisioningState) => void;
  private state: ProvisioningState = "start";

  constructor(config: ProvisioningConfig, options: DatabaseTasksOptions = {}) {
    this.config = config;
    this.connectionFactory = options.connectionFactory ?? new TypeOrmConnectionFactory();
    this.commandRunner = options.commandRunner ?? new ExecFileCommandRunner();
    this.logger = (options.logger ?? makeLogger()).child({
      component: "postgis-tasks",
      database: config.databaseName,
    });
    this.onTransition = options.onTransition;
  }

  getState(): ProvisioningState {
    return this.state;
  }

  /**
   * Creates the database, then installs the configured extensions into it.
   * 
   * @returns `created` or `already_exists` once extensions are installed;
   * `failed` when the server refused CREATE DATABASE for another reason
   * @throws {SchemaSearchPathError} Before connecting, if topology is
   * requested without `topology` on the search path
   * @throws {ProvisioningConnectionError}
   * @throws {DatabaseAlreadyExistsError} With `failIfExists`
   */
  async create(options: CreateOptions = {}): Promise<ProvisioningResult> {
    this.transition("start");
    ProvisioningGuards.assertSearchPathCoversExtensions(this.config);

    const result = await withConnection(
      () => connectAsAdmin(this.connectionFactory, this.config),
      this.logger,
      async (admin) => {
        this.transition("admin_connected");
        return createDatabase(admin, this.config);
      }
    );

    if (result.status === "failed") {
      this.logger.error({ reason: result.reason }, "database creation failed");
      return result;
    }

    if (result.status === "already_exists") {
      this.transition("database_exists");
      if (options.failIfExists) {
        throw new DatabaseAlreadyExistsError(this.config.databaseName);
      }
    } else {
      this.transition("database_created");
    }

    await this.setupGis();
    this.transition("done");
    return result;
  }

  /**
   * Installs the configured extensions into the (existing) target database.
   */
  async setupGis(): Promise<void> {
    await withConnection(
      () => connectToTarget(this.connectionFactory, this.config),
      this.logger,
      async (target) => {
        this.transition("target_connected");
        await installExtensions(target, this.config, this.logger);
        this.transition("extensions_installed");
      }
    );
  }

  async drop(): Promise<void> {
    await withConnection(
      () => connectAsAdmin(this.connectionFactory, this.config),
      this.logger,
      (admin) => dropDatabase(admin, this.config)
    );
    this.logger.info("database dropped");
  }

  async structureDump(filename: string): Promise<void> {
    await structureDump(this.commandRunner, this.config, filename);
    this.logger.info({ filename }, "structure dumped");
  }

  async structureLoad(filename: string): Promise<void> {
    await structureLoad(this.commandRunner, this.config, filename);
    this.logger.info({ filename }, "structure loaded");
  }

  private transition(state: ProvisioningState): void {
    this.state = state;
    this.logger.debug({ state }, "provisioning state");
    this.onTransition?.(state);
  }
}
