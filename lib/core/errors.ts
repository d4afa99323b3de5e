/**
 * Error Taxonomy
 *
 * Every failure the pipeline reports is an `ExtractionError` with a stable
 * `code`. All of them are terminal for the current request: nothing is retried
 * and no partial record is ever produced.
 *
 * | Code                        | Raised by            |
 * |-----------------------------|----------------------|
 * | `CONFIG_INVALID`            | config loading       |
 * | `API_KEY_MISSING`           | config loading       |
 * | `DOCUMENT_DECODE_FAILED`    | document loader      |
 * | `EXTRACTION_SERVICE_FAILED` | extraction client    |
 * | `MALFORMED_RESPONSE`        | response normalizer  |
 * | `UNKNOWN`                   | anything else        |
 *
 * @module errors
 */

export type ExtractionErrorCode =
    | "CONFIG_INVALID"
    | "API_KEY_MISSING"
    | "DOCUMENT_DECODE_FAILED"
    | "EXTRACTION_SERVICE_FAILED"
    | "MALFORMED_RESPONSE"
    | "UNKNOWN";

export class ExtractionError extends Error {
    readonly code: ExtractionErrorCode;

    constructor(message: string, code: ExtractionErrorCode = "UNKNOWN", options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ExtractionError";
        this.code = code;
    }
}

export class ConfigError extends ExtractionError {
    constructor(message: string) {
        super(message, "CONFIG_INVALID");
        this.name = "ConfigError";
    }
}

export class ApiKeyError extends ExtractionError {
    constructor(message: string) {
        super(message, "API_KEY_MISSING");
        this.name = "ApiKeyError";
    }
}

export type DocumentDecodeReason = "rasterizer-unavailable" | "corrupt-document" | "corrupt-image";

/**
 * The upload could not be turned into page images. Raised before any model call.
 */
export class DocumentDecodeError extends ExtractionError {
    readonly reason: DocumentDecodeReason;

    constructor(message: string, reason: DocumentDecodeReason, options?: { cause?: unknown }) {
        super(message, "DOCUMENT_DECODE_FAILED", options);
        this.name = "DocumentDecodeError";
        this.reason = reason;
    }
}

/**
 * The external model call failed (auth, quota, network, service-side).
 */
export class ExtractionServiceError extends ExtractionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, "EXTRACTION_SERVICE_FAILED", options);
        this.name = "ExtractionServiceError";
    }
}

/**
 * The model answered, but not with a JSON object. Keeps the raw text so the
 * caller can show it for manual inspection.
 */
export class MalformedResponseError extends ExtractionError {
    readonly rawText: string;

    constructor(message: string, rawText: string, options?: { cause?: unknown }) {
        super(message, "MALFORMED_RESPONSE", options);
        this.name = "MalformedResponseError";
        this.rawText = rawText;
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === "string" ? error : "Unknown error";
}

/**
 * Normalize any thrown value into an `ExtractionError`.
 *
 * Typed errors pass through untouched; anything else is wrapped with code
 * `UNKNOWN`, prefixed by `context` when given.
 */
export function wrapError(error: unknown, context?: string): ExtractionError {
    if (error instanceof ExtractionError) {
        return error;
    }
    const message = context ? `${context}: ${errorMessage(error)}` : errorMessage(error);
    return new ExtractionError(message, "UNKNOWN", { cause: error });
}
