export class PathError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = this.constructor.name;
  }
}

export class InvalidExpressionError extends PathError {
  readonly expression: string;

  constructor(expression: string, reason: string, options?: ErrorOptions) {
    super(
      "INVALID_EXPRESSION",
      `Invalid path expression ${JSON.stringify(expression)}: ${reason}`,
      options,
    );
    this.expression = expression;
  }
}

export class MissingArgumentError extends PathError {
  readonly key: string | undefined;

  /** Omit `key` when the whole argument map is missing or empty. */
  constructor(node: string, key?: string) {
    super(
      "MISSING_ARGUMENT",
      key === undefined
        ? `${node} requires arguments but the argument map is missing or empty`
        : `${node} has no argument for key "${key}"`,
    );
    this.key = key;
  }
}

export class UnsupportedWriteError extends PathError {
  readonly node: string;

  constructor(node: string) {
    super("UNSUPPORTED_WRITE", `Cannot write through ${node}: no setter`);
    this.node = node;
  }
}

export class UnsupportedOperationError extends PathError {
  constructor(message: string) {
    super("UNSUPPORTED_OPERATION", message);
  }
}

export class InstantiationError extends PathError {
  readonly typeName: string;

  constructor(typeName: string, options?: ErrorOptions) {
    const cause = options?.cause;
    super(
      "INSTANTIATION_FAILURE",
      cause === undefined
        ? `Could not create an instance of ${typeName}`
        : `Could not create an instance of ${typeName}: ${cause instanceof Error ? cause.message : String(cause)}`,
      options,
    );
    this.typeName = typeName;
  }
}

export class InvalidArgumentError extends PathError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class MemberNotFoundError extends PathError {
  readonly member: string;

  constructor(kind: "Field" | "Method", owner: string, member: string, detail?: string) {
    super(
      "MEMBER_NOT_FOUND",
      `${kind} not found: ${owner}.${member}${detail ? ` (${detail})` : ""}`,
    );
    this.member = member;
  }
}
