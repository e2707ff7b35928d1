import { execFile } from "node:child_process";
import { devNull } from "node:os";
import { promisify } from "node:util";
import type { ProvisioningConfig } from "../types";
import { DumpToolError } from "../errors";
import { ProvisioningGuards } from "../utils/guards";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program. Rejects with DumpToolError on failure.
 */
export interface CommandRunner {
  run(command: string, args: string[], env: NodeJS.ProcessEnv): Promise<CommandResult>;
}

/**
 * CommandRunner backed by child_process.execFile (no shell).
 */
export class ExecFileCommandRunner implements CommandRunner {
  async run(command: string, args: string[], env: NodeJS.ProcessEnv): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        env,
        encoding: "utf8",
        maxBuffer: 16 * 1024 * 1024,
      });
      return { stdout, stderr };
    } catch (error: unknown) {
      const stderr =
        ProvisioningGuards.isRecord(error) && typeof error.stderr === "string" && error.stderr
          ? error.stderr
          : error instanceof Error
            ? error.message
            : String(error);
      const exitCode =
        ProvisioningGuards.isRecord(error) && typeof error.code === "number" ? error.code : undefined;
      throw new DumpToolError(command, stderr, exitCode, error instanceof Error ? error : undefined);
    }
  }
}

/**
 * libpq environment for the dump tools. Runs as the owner so dumped
 * objects carry no superuser-only statements.
 */
export function dumpToolEnv(
  config: ProvisioningConfig,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...base,
    PGHOST: config.host,
    PGPORT: String(config.port),
  };
  if (config.ownerUsername !== undefined) {
    env.PGUSER = config.ownerUsername;
  }
  if (config.ownerPassword !== undefined) {
    env.PGPASSWORD = config.ownerPassword;
  }
  return env;
}

/**
 * Schemas to dump: the search path plus the extension schema, deduplicated.
 * An empty list dumps everything.
 */
export function dumpSchemas(config: ProvisioningConfig): string[] {
  const schemas = [...config.schemaSearchPath];
  if (config.extensionSchema) {
    schemas.push(config.extensionSchema);
  }
  return [...new Set(schemas)];
}

export function structureDumpArgs(config: ProvisioningConfig, filename: string): string[] {
  return [
    "--schema-only",
    "--no-privileges",
    "--no-owner",
    "--file",
    filename,
    ...dumpSchemas(config).map((schema) => `--schema=${schema}`),
    config.databaseName,
  ];
}

export function structureLoadArgs(config: ProvisioningConfig, filename: string): string[] {
  return [
    "--set",
    "ON_ERROR_STOP=1",
    "--quiet",
    "--no-psqlrc",
    "--output",
    devNull,
    "--file",
    filename,
    config.databaseName,
  ];
}

/**
 * Writes the database structure to `filename` with pg_dump.
 *
 * @throws {DumpToolError}
 */
export async function structureDump(
  runner: CommandRunner,
  config: ProvisioningConfig,
  filename: string
): Promise<void> {
  await runner.run("pg_dump", structureDumpArgs(config, filename), dumpToolEnv(config));
}

/**
 * Loads a structure file into the database with psql, stopping at the first error.
 *
 * @throws {DumpToolError}
 */
export async function structureLoad(
  runner: CommandRunner,
  config: ProvisioningConfig,
  filename: string
): Promise<void> {
  await runner.run("psql", structureLoadArgs(config, filename), dumpToolEnv(config));
}
