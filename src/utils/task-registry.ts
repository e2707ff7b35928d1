import type { DatabaseTasksClass } from "../tasks/postgis-database-tasks";
import { InvalidConfigError } from "../errors";

interface RegistryEntry {
  pattern: RegExp;
  tasks: DatabaseTasksClass;
}

/**
 * Maps adapter names to database task classes.
 * Later registrations win over earlier ones matching the same adapter;
 * unregistering a pattern brings back what it had overridden.
 */
export class DatabaseTasksRegistry {
  private static entries: RegistryEntry[] = [];

  /**
   * Registers a task class for adapters matching `pattern`.
   * Registering the class already active for the pattern is a no-op.
   */
  static register(pattern: RegExp, tasks: DatabaseTasksClass): void {
    const current = this.latest(pattern);
    if (current !== undefined && this.entries[current].tasks === tasks) {
      return;
    }
    this.entries.push({ pattern, tasks });
  }

  /**
   * Removes the latest registration for `pattern`, if any.
   */
  static unregister(pattern: RegExp): void {
    const current = this.latest(pattern);
    if (current !== undefined) {
      this.entries.splice(current, 1);
    }
  }

  static isRegistered(pattern: RegExp): boolean {
    return this.latest(pattern) !== undefined;
  }

  /**
   * Finds the task class for an adapter name.
   * 
   * @throws {InvalidConfigError} If no registered pattern matches
   */
  static resolve(adapter: string): DatabaseTasksClass {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.pattern.test(adapter)) {
        return entry.tasks;
      }
    }
    throw new InvalidConfigError(`No database tasks registered for adapter "${adapter}"`, ["adapter"], {
      adapter,
      registered: this.entries.map((entry) => entry.pattern.source),
    });
  }

  private static latest(pattern: RegExp): number | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].pattern.source === pattern.source) {
        return i;
      }
    }
    return undefined;
  }
}
