/**
 * Error hierarchy for reqgraph.
 *
 * Discovery and I/O failures are thrown; item parse failures are thrown by the
 * codec but converted into validation issues by the graph builder.
 */

export class ReqgraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "ReqgraphError";
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/** Missing or malformed document / project configuration. */
export class ConfigError extends ReqgraphError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/** Duplicate document prefix or cyclic document hierarchy. Fatal for a whole build. */
export class DiscoveryError extends ReqgraphError {
  constructor(
    message: string,
    public readonly prefixes: string[],
    details: Record<string, unknown> = {},
  ) {
    super(message, "DISCOVERY_ERROR", { prefixes, ...details });
    this.name = "DiscoveryError";
  }
}

/** An item file that cannot be turned into an Item. */
export class ItemParseError extends ReqgraphError {
  constructor(
    message: string,
    public readonly uid: string,
    details: Record<string, unknown> = {},
  ) {
    super(message, "ITEM_PARSE_ERROR", { uid, ...details });
    this.name = "ItemParseError";
  }
}

/** Filesystem failure. Always propagated to the caller. */
export class IOError extends ReqgraphError {
  constructor(
    message: string,
    public readonly path: string,
    options: { cause?: unknown } = {},
  ) {
    super(message, "IO_ERROR", { path });
    this.name = "IOError";
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NotFoundError extends ReqgraphError {
  constructor(entityType: string, id: string) {
    super(`${entityType} '${id}' not found`, "NOT_FOUND", { entityType, id });
    this.name = "NotFoundError";
  }
}

export class ConflictError extends ReqgraphError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONFLICT", details);
    this.name = "ConflictError";
  }
}

/** True for Node filesystem errors carrying the given errno code. */
export function isErrnoCode(err: unknown, code: string): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === code
  );
}

/** Wrap a raw filesystem failure as an IOError, leaving reqgraph errors untouched. */
export function toIOError(err: unknown, action: string, path: string): Error {
  if (err instanceof ReqgraphError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new IOError(`Failed to ${action} ${path}: ${reason}`, path, { cause: err });
}
