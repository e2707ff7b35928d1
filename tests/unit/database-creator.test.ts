import { describe, it, expect, beforeEach } from "@jest/globals";
import { resolveConfig } from "../../src/config";
import { ProvisioningConnectionError, SqlExecutionError } from "../../src/errors";
import { createDatabase, createDatabaseStatement, dropDatabase } from "../../src/tasks";
import type { SqlConnection } from "../../src/types";
import { geoDbLegacy, geoDbWithSuperuser } from "../fixtures/configs";
import { InMemoryPostgres } from "../setup";

describe("Database Creator", () => {
  let server: InMemoryPostgres;
  let admin: SqlConnection;

  beforeEach(async () => {
    server = new InMemoryPostgres();
    admin = await server.open({
      host: "localhost",
      port: 5432,
      database: "postgres",
      searchPath: ["public"],
      connectTimeoutMs: 1000,
      statementTimeoutMs: 1000,
    });
  });

  it("should create the database with the requested encoding", async () => {
    const result = await createDatabase(admin, resolveConfig(geoDbLegacy));

    expect(result).toEqual({ status: "created" });
    expect(server.statementsFor("postgres")).toEqual(["CREATE DATABASE geo_db ENCODING = 'utf8'"]);
    expect(server.databases.get("geo_db")?.owner).toBeUndefined();
  });

  it("should hand the database to the owner when a superuser creates it", async () => {
    await createDatabase(admin, resolveConfig(geoDbWithSuperuser));

    expect(server.statementsFor("postgres")).toEqual([
      "CREATE DATABASE geo_db ENCODING = 'utf8' OWNER = app",
    ]);
    expect(server.databases.get("geo_db")?.owner).toBe("app");
  });

  it("should pass creation options through", () => {
    const statement = createDatabaseStatement(
      resolveConfig({ database: "geo_db", encoding: "latin1", template: "template_postgis", connection_limit: 3 })
    );

    expect(statement).toBe(
      "CREATE DATABASE geo_db ENCODING = 'latin1' TEMPLATE = template_postgis CONNECTION LIMIT = 3"
    );
  });

  it("should report an existing database as already_exists", async () => {
    server.addDatabase("geo_db");

    const result = await createDatabase(admin, resolveConfig(geoDbLegacy));

    expect(result).toEqual({ status: "already_exists" });
  });

  it("should report already_exists on every re-run", async () => {
    const config = resolveConfig(geoDbLegacy);

    expect(await createDatabase(admin, config)).toEqual({ status: "created" });
    expect(await createDatabase(admin, config)).toEqual({ status: "already_exists" });
    expect(await createDatabase(admin, config)).toEqual({ status: "already_exists" });
  });

  it("should return failed with the server message for other errors", async () => {
    server.failStatement(
      /^CREATE DATABASE/,
      Object.assign(new Error("permission denied to create database"), { code: "42501" })
    );

    const result = await createDatabase(admin, resolveConfig(geoDbLegacy));

    expect(result.status).toBe("failed");
    if (result.status === "failed") {
      expect(result.reason).toBe("permission denied to create database");
      expect(result.error).toBeInstanceOf(SqlExecutionError);
      expect(result.error.sqlState).toBe("42501");
    }
  });

  it("should throw connection errors instead of returning them", async () => {
    const closed: SqlConnection = {
      database: "postgres",
      execute: async () => {
        throw new ProvisioningConnectionError('Connection to "postgres" is closed', "postgres");
      },
      close: async () => undefined,
    };

    await expect(createDatabase(closed, resolveConfig(geoDbLegacy))).rejects.toThrow(
      ProvisioningConnectionError
    );
  });

  it("should drop the database if it exists", async () => {
    server.addDatabase("geo_db");
    const config = resolveConfig(geoDbLegacy);

    await dropDatabase(admin, config);
    await dropDatabase(admin, config);

    expect(server.databases.has("geo_db")).toBe(false);
    expect(server.statementsFor("postgres")).toEqual([
      "DROP DATABASE IF EXISTS geo_db",
      "DROP DATABASE IF EXISTS geo_db",
    ]);
  });
});
