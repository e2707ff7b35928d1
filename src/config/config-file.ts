import { readFile } from "node:fs/promises";
import type { RawConfig } from "../types";
import { InvalidConfigError } from "../errors";
import { ProvisioningGuards } from "../utils/guards";

/**
 * Loads a raw configuration record from a JSON file.
 *
 * With `env`, the file is read as a map of named records (as in a
 * database.yml with one entry per environment) and that entry is returned.
 *
 * @throws {InvalidConfigError} If the file cannot be read, is not JSON,
 * or does not contain the requested entry
 */
export async function loadConfigFile(path: string, env?: string): Promise<RawConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new InvalidConfigError(
      `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ["(file)"],
      { path }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigError(
      `Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ["(file)"],
      { path }
    );
  }

  if (!ProvisioningGuards.isRecord(parsed)) {
    throw new InvalidConfigError(`Configuration file ${path} must contain an object`, ["(root)"], {
      path,
    });
  }

  if (env === undefined) {
    return parsed;
  }

  const entry = parsed[env];
  if (!ProvisioningGuards.isRecord(entry)) {
    throw new InvalidConfigError(
      `Configuration file ${path} has no "${env}" entry`,
      [env],
      { path, available: Object.keys(parsed) }
    );
  }
  return entry;
}
