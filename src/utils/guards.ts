import type { ProvisioningConfig } from "../types";
import { SchemaSearchPathError } from "../errors";
import { CONSTANTS } from "./constants";

/**
 * Type guards and assertions shared by the provisioning tasks.
 * 
 * @internal
 */
export class ProvisioningGuards {
  /**
   * Type guard: plain object records (not arrays, not null).
   */
  static isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
  }

  /**
   * Fails when an extension that lives in a fixed schema is requested
   * without that schema on the search path.
   *
   * @throws {SchemaSearchPathError}
   */
  static assertSearchPathCoversExtensions(
    config: Pick<ProvisioningConfig, "extensions" | "schemaSearchPath">
  ): void {
    const needsTopology = config.extensions.includes(CONSTANTS.TOPOLOGY_EXTENSION);
    if (needsTopology && !config.schemaSearchPath.includes(CONSTANTS.TOPOLOGY_SCHEMA)) {
      throw new SchemaSearchPathError(
        CONSTANTS.TOPOLOGY_EXTENSION,
        CONSTANTS.TOPOLOGY_SCHEMA,
        config.schemaSearchPath
      );
    }
  }
}
