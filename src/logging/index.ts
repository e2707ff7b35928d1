export { makeLogger, makeNoopLogger } from "./logger";
export type { Logger } from "./logger";
export { REDACT_PATHS } from "./redact";
