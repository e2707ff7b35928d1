import reservedWords from "./reserved-words.json";

const RESERVED = new Set<string>(reservedWords);
const SIMPLE_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;

/**
 * Options accepted by CREATE DATABASE.
 */
export interface CreateDatabaseOptions {
  encoding: string;
  owner?: string;
  template?: string;
  collation?: string;
  ctype?: string;
  tablespace?: string;
  connectionLimit?: number;
}

/**
 * A statement plus its bind parameters.
 */
export interface BoundStatement {
  text: string;
  parameters: unknown[];
}

/**
 * Builds the DDL issued during provisioning.
 * 
 * Names come from configuration, so every identifier goes through
 * `quoteIdentifier` and every literal through `quoteLiteral`.
 */
export class SqlBuilder {
  /**
   * Quotes an identifier only when PostgreSQL would otherwise fold or reject it.
   */
  static quoteIdentifier(name: string): string {
    if (SIMPLE_IDENTIFIER.test(name) && !RESERVED.has(name)) {
      return name;
    }
    return `"${name.replace(/"/g, '""')}"`;
  }

  static quoteLiteral(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
  }

  static createDatabase(name: string, options: CreateDatabaseOptions): string {
    const clauses = [`CREATE DATABASE ${this.quoteIdentifier(name)}`];
    clauses.push(`ENCODING = ${this.quoteLiteral(options.encoding)}`);
    if (options.owner) {
      clauses.push(`OWNER = ${this.quoteIdentifier(options.owner)}`);
    }
    if (options.template) {
      clauses.push(`TEMPLATE = ${this.quoteIdentifier(options.template)}`);
    }
    if (options.collation) {
      clauses.push(`LC_COLLATE = ${this.quoteLiteral(options.collation)}`);
    }
    if (options.ctype) {
      clauses.push(`LC_CTYPE = ${this.quoteLiteral(options.ctype)}`);
    }
    if (options.tablespace) {
      clauses.push(`TABLESPACE = ${this.quoteIdentifier(options.tablespace)}`);
    }
    if (options.connectionLimit !== undefined) {
      clauses.push(`CONNECTION LIMIT = ${Math.trunc(options.connectionLimit)}`);
    }
    return clauses.join(" ");
  }

  static dropDatabase(name: string): string {
    return `DROP DATABASE IF EXISTS ${this.quoteIdentifier(name)}`;
  }

  static createSchema(name: string): string {
    return `CREATE SCHEMA ${this.quoteIdentifier(name)}`;
  }

  static grantSchemaToPublic(name: string): string {
    return `GRANT ALL ON SCHEMA ${this.quoteIdentifier(name)} TO PUBLIC`;
  }

  /**
   * CREATE EXTENSION, optionally placed in a schema.
   *
   * `placement` picks between `SCHEMA x` (fixed schema owned by the
   * extension) and `WITH SCHEMA x` (user chosen schema).
   */
  static createExtension(
    name: string,
    schema?: string,
    placement: "schema" | "with_schema" = "with_schema"
  ): string {
    const statement = `CREATE EXTENSION IF NOT EXISTS ${this.quoteIdentifier(name)}`;
    if (!schema) {
      return statement;
    }
    const keyword = placement === "schema" ? "SCHEMA" : "WITH SCHEMA";
    return `${statement} ${keyword} ${this.quoteIdentifier(schema)}`;
  }

  static schemaExists(name: string): BoundStatement {
    return {
      text: "SELECT schema_name FROM information_schema.schemata WHERE schema_name = $1",
      parameters: [name],
    };
  }
}
