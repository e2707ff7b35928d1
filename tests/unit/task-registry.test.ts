import { describe, it, expect, afterEach } from "@jest/globals";
import { DatabaseTasksRegistry } from "../../src/utils/task-registry";
import { createDatabaseTasks, registerDefaultTasks } from "../../src/factory";
import { InvalidConfigError } from "../../src/errors";
import { PostgisDatabaseTasks } from "../../src/tasks";
import { makeNoopLogger } from "../../src/logging";
import { geoDbDataSource, geoDbLegacy } from "../fixtures/configs";

class CustomTasks extends PostgisDatabaseTasks {}

describe("DatabaseTasksRegistry", () => {
  afterEach(() => {
    DatabaseTasksRegistry.unregister(/postgis_custom/);
    registerDefaultTasks();
  });

  it("should register the default postgis tasks idempotently", () => {
    registerDefaultTasks();
    registerDefaultTasks();

    expect(DatabaseTasksRegistry.isRegistered(/postgis/)).toBe(true);
    expect(DatabaseTasksRegistry.resolve("postgis")).toBe(PostgisDatabaseTasks);
  });

  it("should prefer the latest matching registration", () => {
    registerDefaultTasks();
    DatabaseTasksRegistry.register(/postgis_custom/, CustomTasks);

    expect(DatabaseTasksRegistry.resolve("postgis_custom")).toBe(CustomTasks);
    expect(DatabaseTasksRegistry.resolve("postgis")).toBe(PostgisDatabaseTasks);
  });

  it("should stop resolving after unregister", () => {
    DatabaseTasksRegistry.register(/postgis_custom/, CustomTasks);
    DatabaseTasksRegistry.unregister(/postgis_custom/);

    expect(DatabaseTasksRegistry.isRegistered(/postgis_custom/)).toBe(false);
    expect(DatabaseTasksRegistry.resolve("postgis_custom")).toBe(PostgisDatabaseTasks);
  });

  it("should restore the overridden class on unregister", () => {
    DatabaseTasksRegistry.register(/postgis/, PostgisDatabaseTasks);
    DatabaseTasksRegistry.register(/postgis/, CustomTasks);
    expect(DatabaseTasksRegistry.resolve("postgis")).toBe(CustomTasks);

    DatabaseTasksRegistry.unregister(/postgis/);

    expect(DatabaseTasksRegistry.isRegistered(/postgis/)).toBe(true);
    expect(DatabaseTasksRegistry.resolve("postgis")).toBe(PostgisDatabaseTasks);
  });

  it("should need a single unregister after registering the same class twice", () => {
    DatabaseTasksRegistry.register(/postgis/, CustomTasks);
    DatabaseTasksRegistry.register(/postgis/, CustomTasks);

    DatabaseTasksRegistry.unregister(/postgis/);

    expect(DatabaseTasksRegistry.resolve("postgis")).toBe(PostgisDatabaseTasks);
  });

  it("should reject adapters without tasks", () => {
    expect(() => DatabaseTasksRegistry.resolve("sqlite3")).toThrow(InvalidConfigError);
    expect(() => DatabaseTasksRegistry.resolve("sqlite3")).toThrow(
      'No database tasks registered for adapter "sqlite3"'
    );
  });

  describe("createDatabaseTasks()", () => {
    it("should build tasks for legacy and data-source records", () => {
      const legacy = createDatabaseTasks(geoDbLegacy, { logger: makeNoopLogger() });
      const dataSource = createDatabaseTasks(geoDbDataSource, { logger: makeNoopLogger() });

      expect(legacy).toBeInstanceOf(PostgisDatabaseTasks);
      expect(legacy.config.databaseName).toBe("geo_db");
      expect(dataSource).toBeInstanceOf(PostgisDatabaseTasks);
      expect(dataSource.config.extensionSchema).toBe("gis");
    });

    it("should keep a caller's own class registered for postgis", () => {
      DatabaseTasksRegistry.register(/postgis/, CustomTasks);
      try {
        const tasks = createDatabaseTasks(
          { adapter: "postgis", database: "geo_db" },
          { logger: makeNoopLogger() }
        );

        expect(tasks).toBeInstanceOf(CustomTasks);
      } finally {
        DatabaseTasksRegistry.unregister(/postgis/);
      }
      expect(DatabaseTasksRegistry.resolve("postgis")).toBe(PostgisDatabaseTasks);
    });

    it("should reject legacy records for other adapters", () => {
      expect(() => createDatabaseTasks({ adapter: "postgresql", database: "geo_db" })).toThrow(
        'No database tasks registered for adapter "postgresql"'
      );
    });
  });
});
