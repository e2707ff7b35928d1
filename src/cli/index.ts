import type { Logger } from "pino";
import type { ConnectionFactory } from "../types";
import { ProvisioningError } from "../errors";
import { loadConfigFile } from "../config/config-file";
import { createDatabaseTasks } from "../factory/create-database-tasks";
import { makeLogger } from "../logging/logger";
import type { CommandRunner } from "../tasks/structure-tasks";

export const USAGE = [
  "Usage: provision <command> <config-file> [--env <name>]",
  "",
  "Commands:",
  "  create                  create the database and install extensions",
  "  extensions              install extensions into an existing database",
  "  drop                    drop the database if it exists",
  "  structure-dump <file>   write the database structure with pg_dump",
  "  structure-load <file>   load a structure file with psql",
].join("\n");

const COMMANDS = ["create", "extensions", "drop", "structure-dump", "structure-load"] as const;
type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  configPath: string;
  env?: string;
  file?: string;
}

export interface CliDeps {
  connectionFactory?: ConnectionFactory;
  commandRunner?: CommandRunner;
  logger?: Logger;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parses argv (without node and script). Returns an error message on bad usage.
 */
export function parseArgs(argv: readonly string[]): CliArgs | { error: string } {
  const positional: string[] = [];
  let env: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--env") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return { error: "--env requires a value" };
      }
      env = value;
      i++;
    } else if (arg.startsWith("--env=")) {
      env = arg.slice("--env=".length);
    } else if (arg.startsWith("--")) {
      return { error: `Unknown option ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  const [command, configPath, file, ...rest] = positional;
  if (command === undefined || !isCommand(command)) {
    return { error: command === undefined ? "Missing command" : `Unknown command ${command}` };
  }
  if (configPath === undefined) {
    return { error: "Missing config file" };
  }

  const needsFile = command === "structure-dump" || command === "structure-load";
  if (needsFile && file === undefined) {
    return { error: `${command} requires a file argument` };
  }
  if ((!needsFile && file !== undefined) || rest.length > 0) {
    return { error: "Too many arguments" };
  }

  return { command, configPath, env, file };
}

/**
 * Runs one CLI invocation and resolves to the process exit code:
 * 0 on success (including an already existing database), 1 on a
 * provisioning failure, 2 on bad usage.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.err ?? ((line: string) => process.stderr.write(`${line}\n`));

  const args = parseArgs(argv);
  if ("error" in args) {
    err(args.error);
    err(USAGE);
    return 2;
  }

  const logger = deps.logger ?? makeLogger({ command: args.command });

  try {
    const raw = await loadConfigFile(args.configPath, args.env);
    const tasks = createDatabaseTasks(raw, {
      connectionFactory: deps.connectionFactory,
      commandRunner: deps.commandRunner,
      logger,
    });
    const database = tasks.config.databaseName;

    switch (args.command) {
      case "create": {
        const result = await tasks.create();
        if (result.status === "failed") {
          err(`failed:${database}: ${result.reason}`);
          return 1;
        }
        out(`${result.status === "created" ? "created" : "exists"}:${database}`);
        return 0;
      }
      case "extensions":
        await tasks.setupGis();
        out(`extensions:${database}`);
        return 0;
      case "drop":
        await tasks.drop();
        out(`dropped:${database}`);
        return 0;
      case "structure-dump":
      case "structure-load": {
        const file = args.file ?? "";
        if (args.command === "structure-dump") {
          await tasks.structureDump(file);
        } else {
          await tasks.structureLoad(file);
        }
        out(`${args.command}:${database}:${file}`);
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof ProvisioningError) {
      logger.error({ err: error, code: error.code }, "provisioning failed");
      err(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
