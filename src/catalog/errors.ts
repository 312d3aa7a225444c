export class XmlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "XmlParseError";
  }
}

export interface ErrorDescription {
  kind: string;
  detail: string;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof Error) {
    return { kind: error.name, detail: error.message };
  }
  return { kind: typeof error, detail: String(error) };
}

const OUT_OF_MEMORY_CODES = new Set(["ERR_FS_FILE_TOO_LARGE", "ERR_STRING_TOO_LONG", "ERR_BUFFER_TOO_LARGE"]);

/**
 * Node cannot recover from a real heap exhaustion, so the catchable signals of
 * "too large to hold in memory" are the RangeErrors thrown by string/array
 * allocation and the too-large error codes raised by fs and Buffer.
 */
export function isOutOfMemoryError(error: unknown): boolean {
  if (error instanceof RangeError) {
    return true;
  }
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return OUT_OF_MEMORY_CODES.has(error.code);
  }
  return false;
}
