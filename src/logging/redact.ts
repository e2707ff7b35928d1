/**
 * Paths redacted from log output. Configs and connection descriptors are
 * logged whole in places, so their secret-bearing keys are listed here.
 */
export const REDACT_PATHS = [
  "password",
  "ownerPassword",
  "superuserPassword",
  "config.ownerPassword",
  "config.superuserPassword",
  "descriptor.password",
  "env.PGPASSWORD",
];
