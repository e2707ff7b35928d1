/**
 * Normalizes a comma-separated string or a list into a trimmed ordered
 * list of non-blank names.
 */
export function normalizeNameList(value: string | readonly string[]): string[] {
  const parts = typeof value === "string" ? value.split(",") : value;
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

/**
 * Extension names are case-insensitive to the server, which folds the
 * unquoted name; they are folded here so the quoted form still matches.
 */
export function normalizeExtensionList(value: string | readonly string[]): string[] {
  return normalizeNameList(value).map((name) => name.toLowerCase());
}

/**
 * Superuser falls back to the owner; it only counts as a distinct
 * superuser when it names a different role.
 */
export function resolveSuperuser(
  owner: { username?: string; password?: string },
  superuser: { username?: string; password?: string }
): { superuserUsername?: string; superuserPassword?: string; hasSuperuser: boolean } {
  const superuserUsername = superuser.username ?? owner.username;
  return {
    superuserUsername,
    superuserPassword: superuser.password ?? owner.password,
    hasSuperuser: superuser.username !== undefined && superuser.username !== owner.username,
  };
}
