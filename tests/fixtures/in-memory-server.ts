import type { ConnectionDescriptor, ConnectionFactory, Row, SqlConnection } from "../../src/types";

/**
 * In-process stand-in for a PostgreSQL server. Understands exactly the
 * statements the provisioning tasks issue and keeps a small catalog per
 * database, so idempotence and ordering can be asserted.
 */

export interface FakeDatabase {
  owner?: string;
  encoding: string;
  schemas: Set<string>;
  grants: Set<string>;
  extensions: Map<string, string>;
}

export interface ExecutedStatement {
  database: string;
  text: string;
  parameters?: unknown[];
}

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function unquote(identifier: string): string {
  if (identifier.startsWith('"') && identifier.endsWith('"')) {
    return identifier.slice(1, -1).replace(/""/g, '"');
  }
  return identifier;
}

function newDatabase(encoding = "utf8", owner?: string): FakeDatabase {
  return {
    owner,
    encoding,
    schemas: new Set(["public"]),
    grants: new Set(),
    extensions: new Map(),
  };
}

const IDENTIFIER = '("(?:[^"]|"")*"|[a-z_][a-z0-9_$]*)';

export class InMemoryPostgres implements ConnectionFactory {
  readonly databases = new Map<string, FakeDatabase>([["postgres", newDatabase()]]);
  readonly opened: ConnectionDescriptor[] = [];
  readonly statements: ExecutedStatement[] = [];
  openConnections = 0;
  closeError?: Error;

  private readonly connectFailures = new Map<string, Error>();
  private readonly statementFailures: Array<{ pattern: RegExp; error: Error }> = [];

  addDatabase(name: string, setup: Partial<Pick<FakeDatabase, "owner" | "encoding">> = {}): FakeDatabase {
    const database = newDatabase(setup.encoding, setup.owner);
    this.databases.set(name, database);
    return database;
  }

  failConnect(database: string, error: Error): void {
    this.connectFailures.set(database, error);
  }

  failStatement(pattern: RegExp, error: Error): void {
    this.statementFailures.push({ pattern, error });
  }

  statementsFor(database: string): string[] {
    return this.statements.filter((s) => s.database === database).map((s) => s.text);
  }

  async open(descriptor: ConnectionDescriptor): Promise<SqlConnection> {
    this.opened.push(descriptor);
    const failure = this.connectFailures.get(descriptor.database);
    if (failure) {
      throw failure;
    }
    if (!this.databases.has(descriptor.database)) {
      throw pgError(`database "${descriptor.database}" does not exist`, "3D000");
    }
    this.openConnections++;
    return new InMemoryConnection(this, descriptor.database);
  }

  run(databaseName: string, text: string, parameters?: unknown[]): Row[] {
    this.statements.push({ database: databaseName, text, parameters });

    const failure = this.statementFailures.find((f) => f.pattern.test(text));
    if (failure) {
      throw failure.error;
    }

    const database = this.databases.get(databaseName);
    if (!database) {
      throw pgError(`database "${databaseName}" does not exist`, "3D000");
    }

    let match = new RegExp(`^CREATE DATABASE ${IDENTIFIER}(.*)$`).exec(text);
    if (match) {
      const name = unquote(match[1]);
      if (this.databases.has(name)) {
        throw pgError(`database "${name}" already exists`, "42P04");
      }
      const encoding = /ENCODING = '([^']*)'/.exec(match[2])?.[1] ?? "utf8";
      const owner = new RegExp(`OWNER = ${IDENTIFIER}`).exec(match[2])?.[1];
      this.addDatabase(name, { encoding, owner: owner === undefined ? undefined : unquote(owner) });
      return [];
    }

    match = new RegExp(`^DROP DATABASE IF EXISTS ${IDENTIFIER}$`).exec(text);
    if (match) {
      this.databases.delete(unquote(match[1]));
      return [];
    }

    if (text.startsWith("SELECT schema_name FROM information_schema.schemata")) {
      const schema = String(parameters?.[0]);
      return database.schemas.has(schema) ? [{ schema_name: schema }] : [];
    }

    match = new RegExp(`^CREATE SCHEMA ${IDENTIFIER}$`).exec(text);
    if (match) {
      const schema = unquote(match[1]);
      if (database.schemas.has(schema)) {
        throw pgError(`schema "${schema}" already exists`, "42P06");
      }
      database.schemas.add(schema);
      return [];
    }

    match = new RegExp(`^GRANT ALL ON SCHEMA ${IDENTIFIER} TO PUBLIC$`).exec(text);
    if (match) {
      database.grants.add(unquote(match[1]));
      return [];
    }

    match = new RegExp(
      `^CREATE EXTENSION IF NOT EXISTS ${IDENTIFIER}(?: (WITH SCHEMA|SCHEMA) ${IDENTIFIER})?$`
    ).exec(text);
    if (match) {
      const extension = unquote(match[1]);
      if (database.extensions.has(extension)) {
        return [];
      }
      if (extension === "postgis_topology") {
        if (!database.extensions.has("postgis")) {
          throw pgError('required extension "postgis" is not installed', "42704");
        }
        database.schemas.add("topology");
      }
      const schema = match[3] === undefined ? "public" : unquote(match[3]);
      if (!database.schemas.has(schema)) {
        throw pgError(`schema "${schema}" does not exist`, "3F000");
      }
      database.extensions.set(extension, schema);
      return [];
    }

    throw pgError(`syntax error in fake server: ${text}`, "42601");
  }
}

class InMemoryConnection implements SqlConnection {
  private closed = false;

  constructor(
    private readonly server: InMemoryPostgres,
    readonly database: string
  ) {}

  async execute(statement: string, parameters?: unknown[]): Promise<Row[]> {
    if (this.closed) {
      throw new Error("connection is closed");
    }
    return this.server.run(this.database, statement, parameters);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.server.openConnections--;
    if (this.server.closeError) {
      throw this.server.closeError;
    }
  }
}
