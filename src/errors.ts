/**
 * Error taxonomy for HPF decoding.
 *
 * Every error here is fatal for the run. A clean end of stream is not an
 * error: the chunk reader returns `null` instead.
 */

export interface ErrorContext {
  /** Name of the chunk kind being decoded, e.g. "data" */
  chunkKind?: string;
  /** Byte offset of the chunk within the file */
  fileOffset?: number;
  /** The specific unexpected value */
  value?: unknown;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.chunkKind !== undefined) {
    parts.push(`chunk=${context.chunkKind}`);
  }
  if (context.fileOffset !== undefined) {
    parts.push(`offset=0x${context.fileOffset.toString(16)}`);
  }
  return parts.length > 0 ? ` [${parts.join(" ")}]` : "";
}

/**
 * Base class for decoding failures.
 */
export abstract class HpfError extends Error {
  private ctx: ErrorContext;

  constructor(
    message: string,
    public readonly code: string,
    context: ErrorContext = {},
  ) {
    super(message + describeContext(context));
    this.name = this.constructor.name;
    this.ctx = { ...context };
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get context(): Readonly<ErrorContext> {
    return this.ctx;
  }

  /**
   * Attach the location of the chunk being decoded, unless the error
   * already carries one.
   */
  atChunk(chunkKind: string, fileOffset: number): this {
    if (this.ctx.chunkKind !== undefined || this.ctx.fileOffset !== undefined) {
      return this;
    }
    const located = { chunkKind, fileOffset };
    this.ctx = { ...this.ctx, ...located };
    this.message += describeContext(located);
    return this;
  }
}

/** Chunk framing is broken: bad length, unknown kind, out-of-bounds read. */
export class StructuralError extends HpfError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "STRUCTURAL", context);
  }
}

/** Embedded document does not match the expected schema. */
export class SchemaError extends HpfError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "SCHEMA", context);
  }
}

/** Chunks disagree with each other, or appear more often than allowed. */
export class ConsistencyError extends HpfError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "CONSISTENCY", context);
  }
}
