// Provisioning configuration type definitions

/**
 * Normalized provisioning request produced by the config resolver.
 *
 * Every other module reads this shape only; which configuration
 * generation it came from is not observable past the resolver.
 *
 * @public
 */
export interface ProvisioningConfig {
  readonly databaseName: string;
  readonly host: string;
  readonly port: number;
  readonly ownerUsername?: string;
  readonly ownerPassword?: string;
  readonly superuserUsername?: string;
  readonly superuserPassword?: string;
  /**
   * True when a superuser distinct from the owner is configured.
   * The created database is then handed over to the owner.
   */
  readonly hasSuperuser: boolean;
  readonly encoding: string;
  readonly collation?: string;
  readonly ctype?: string;
  readonly template?: string;
  readonly tablespace?: string;
  readonly connectionLimit?: number;
  readonly schemaSearchPath: readonly string[];
  readonly extensions: readonly string[];
  readonly extensionSchema?: string;
  /** Database the admin connection attaches to. */
  readonly maintenanceDatabase: string;
  readonly connectTimeoutMs: number;
  readonly statementTimeoutMs: number;
}

/**
 * Raw configuration record as loaded from a config file.
 *
 * @public
 */
export type RawConfig = Record<string, unknown>;

/**
 * Configuration generations understood by the resolver.
 *
 * @public
 */
export type ConfigGeneration = "data-source" | "legacy";
