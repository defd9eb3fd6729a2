/** Error used for invalid CLI usage / flag combinations. */
export class UsageError extends Error {
  override name = "UsageError";
}

/** Error used for a missing, unreadable or invalid tool registry file. */
export class ConfigError extends Error {
  override name = "ConfigError";
}
