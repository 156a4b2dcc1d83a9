/** Codes for malformed or corrupt archive structure. */
export type ZipFormatErrorCode =
  | 'ZIP_EOCD_NOT_FOUND'
  | 'ZIP_TRUNCATED'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_INVALID_SIGNATURE'
  | 'ZIP_HEADER_MISMATCH'
  | 'ZIP_OUT_OF_RANGE'
  | 'ZIP_BAD_DESCRIPTOR'
  | 'ZIP_BAD_COMPRESSED_DATA';

/** Codes for recognised features this codec does not implement. */
export type ZipUnsupportedErrorCode =
  | 'ZIP_UNSUPPORTED_METHOD'
  | 'ZIP_UNSUPPORTED_ZIP64'
  | 'ZIP_UNSUPPORTED_ENCRYPTION'
  | 'ZIP_UNSUPPORTED_MULTI_DISK'
  | 'ZIP_DESCRIPTOR_REQUIRES_SEEK'
  | 'ZIP_SINK_NOT_SEEKABLE';

/** Codes for checksum and size verification failures after decoding. */
export type ZipIntegrityErrorCode = 'ZIP_BAD_CRC' | 'ZIP_SIZE_MISMATCH';

/** Codes for API misuse. */
export type ZipUsageErrorCode =
  | 'ZIP_ENTRY_IN_PROGRESS'
  | 'ZIP_WRITER_CLOSED'
  | 'ZIP_NO_ENTRY_OPEN'
  | 'ZIP_ENTRY_NOT_FOUND'
  | 'ZIP_INVALID_ARGUMENT'
  | 'ZIP_LIMIT_EXCEEDED';

/** Stable ZIP error codes. */
export type ZipErrorCode = ZipFormatErrorCode | ZipUnsupportedErrorCode | ZipIntegrityErrorCode | ZipUsageErrorCode;

export interface ZipErrorOptions {
  entryName?: string | undefined;
  method?: number | undefined;
  offset?: bigint | number | undefined;
  context?: Record<string, string> | undefined;
  cause?: unknown;
}

const CONTEXT_SHADOW_KEYS = new Set<string>(['name', 'code', 'message', 'context', 'entryName', 'method', 'offset']);

/** Base class of every error raised by the codec itself. */
export class ZipError extends Error {
  /** Machine-readable error code. */
  readonly code: ZipErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Compression method related to the error, if available. */
  readonly method?: number | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: bigint | undefined;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(code: ZipErrorCode, message: string, options?: ZipErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ZipError';
    this.code = code;
    this.entryName = options?.entryName;
    this.method = options?.method;
    this.offset = options?.offset === undefined ? undefined : BigInt(options.offset);
    this.context = options?.context;
  }

  /** JSON-safe serialization (bigint offsets become strings). */
  toJSON(): {
    name: string;
    code: ZipErrorCode;
    message: string;
    context: Record<string, string>;
    entryName?: string;
    method?: number;
    offset?: string;
  } {
    const context: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context ?? {})) {
      if (CONTEXT_SHADOW_KEYS.has(key)) continue;
      context[key] = value;
    }
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context,
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.method !== undefined ? { method: this.method } : {}),
      ...(this.offset !== undefined ? { offset: this.offset.toString() } : {})
    };
  }
}

/** Malformed or corrupt structure: bad signatures, missing trailer, truncated or divergent records. */
export class ZipFormatError extends ZipError {
  declare readonly code: ZipFormatErrorCode;

  constructor(code: ZipFormatErrorCode, message: string, options?: ZipErrorOptions) {
    super(code, message, options);
    this.name = 'ZipFormatError';
  }
}

/** A feature the format defines but this codec declines: ZIP64, encryption, spanning, unknown methods. */
export class ZipUnsupportedError extends ZipError {
  declare readonly code: ZipUnsupportedErrorCode;

  constructor(code: ZipUnsupportedErrorCode, message: string, options?: ZipErrorOptions) {
    super(code, message, options);
    this.name = 'ZipUnsupportedError';
  }
}

/** Decoded data disagrees with the stored CRC-32 or sizes. */
export class ZipIntegrityError extends ZipError {
  declare readonly code: ZipIntegrityErrorCode;

  constructor(code: ZipIntegrityErrorCode, message: string, options?: ZipErrorOptions) {
    super(code, message, options);
    this.name = 'ZipIntegrityError';
  }
}

/** The API was driven out of order or with bad arguments. */
export class ZipUsageError extends ZipError {
  declare readonly code: ZipUsageErrorCode;

  constructor(code: ZipUsageErrorCode, message: string, options?: ZipErrorOptions) {
    super(code, message, options);
    this.name = 'ZipUsageError';
  }
}

export function isZipError(value: unknown, code?: ZipErrorCode): value is ZipError {
  if (!(value instanceof ZipError)) return false;
  return code === undefined || value.code === code;
}

/** Non-fatal warning codes. */
export type ZipWarningCode =
  | 'ZIP_TRAILING_BYTES'
  | 'ZIP_EOCD_CANDIDATE_SKIPPED'
  | 'ZIP_DUPLICATE_NAME'
  | 'ZIP_EXTRA_LENGTH_MISMATCH';

/** Non-fatal warning produced while parsing ZIP structures. */
export type ZipWarning = {
  code: ZipWarningCode;
  message: string;
  entryName?: string;
};
