import { describe, it, expect } from "@jest/globals";
import { resolveConfig } from "../../src/config";
import { ProvisioningConnectionError } from "../../src/errors";
import { adminDescriptor, connectAsAdmin, connectToTarget, targetDescriptor } from "../../src/tasks";
import { geoDbDataSource, geoDbWithSuperuser } from "../fixtures/configs";
import { InMemoryPostgres } from "../setup";

describe("Admin Connector", () => {
  it("should target the maintenance database as superuser with a public search path", () => {
    expect(adminDescriptor(resolveConfig(geoDbWithSuperuser))).toEqual({
      host: "localhost",
      port: 5432,
      database: "postgres",
      username: "postgres",
      password: "test-secret",
      searchPath: ["public"],
      connectTimeoutMs: 10000,
      statementTimeoutMs: 60000,
    });
  });

  it("should open the target database with the same credentials", () => {
    expect(targetDescriptor(resolveConfig(geoDbDataSource))).toEqual({
      host: "db.internal",
      port: 5433,
      database: "geo_db",
      username: "postgres",
      password: "test-secret",
      searchPath: ["public"],
      connectTimeoutMs: 2000,
      statementTimeoutMs: 5000,
    });
  });

  it("should open the admin connection through the factory", async () => {
    const server = new InMemoryPostgres();

    const admin = await connectAsAdmin(server, resolveConfig(geoDbWithSuperuser));

    expect(admin.database).toBe("postgres");
    expect(server.openConnections).toBe(1);
    await admin.close();
    expect(server.openConnections).toBe(0);
  });

  it("should wrap connection failures without retrying", async () => {
    const server = new InMemoryPostgres();
    server.failConnect("postgres", new Error('password authentication failed for user "postgres"'));

    const failure = connectAsAdmin(server, resolveConfig(geoDbWithSuperuser));

    await expect(failure).rejects.toBeInstanceOf(ProvisioningConnectionError);
    await expect(failure).rejects.toThrow(
      'Failed to connect to "postgres" at localhost:5432: password authentication failed for user "postgres"'
    );
    expect(server.opened).toHaveLength(1);
  });

  it("should fail to open a target database that does not exist", async () => {
    const server = new InMemoryPostgres();

    await expect(connectToTarget(server, resolveConfig(geoDbWithSuperuser))).rejects.toMatchObject({
      code: "CONNECTION_ERROR",
      database: "geo_db",
    });
  });
});
