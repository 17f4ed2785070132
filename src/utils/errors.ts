/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
    MISSING_API_KEY = "MISSING_API_KEY",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    FILE_READ_ERROR = "FILE_READ_ERROR",
    FILE_WRITE_ERROR = "FILE_WRITE_ERROR",
    DISK_FULL = "DISK_FULL",
    PERMISSION_DENIED = "PERMISSION_DENIED",

    // Input data errors
    EMPTY_INPUT = "EMPTY_INPUT",
    INVALID_INPUT = "INVALID_INPUT",
    MISSING_MUSICBRAINZ_IDS = "MISSING_MUSICBRAINZ_IDS",

    // Remote API errors
    LIDARR_API_ERROR = "LIDARR_API_ERROR",
    MUSICBRAINZ_API_ERROR = "MUSICBRAINZ_API_ERROR",
    RATE_LIMITED = "RATE_LIMITED",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * Failure talking to a remote service. `status` is the HTTP status when the
 * server answered, `transportCode` the socket/axios code when it did not.
 */
export class ApiError extends AppError {
    constructor(
        code: ErrorCode,
        message: string,
        public readonly status?: number,
        public readonly transportCode?: string,
        details?: Record<string, unknown>
    ) {
        super(code, categorizeApiFailure(status, transportCode), message, details);
        this.name = "ApiError";
        Object.setPrototypeOf(this, ApiError.prototype);
    }
}

export class LidarrApiError extends ApiError {
    constructor(
        message: string,
        status?: number,
        transportCode?: string,
        details?: Record<string, unknown>
    ) {
        super(ErrorCode.LIDARR_API_ERROR, message, status, transportCode, details);
        this.name = "LidarrApiError";
        Object.setPrototypeOf(this, LidarrApiError.prototype);
    }
}

export class MusicBrainzApiError extends ApiError {
    constructor(
        message: string,
        status?: number,
        transportCode?: string,
        details?: Record<string, unknown>
    ) {
        super(
            ErrorCode.MUSICBRAINZ_API_ERROR,
            message,
            status,
            transportCode,
            details
        );
        this.name = "MusicBrainzApiError";
        Object.setPrototypeOf(this, MusicBrainzApiError.prototype);
    }
}

export class RateLimitError extends ApiError {
    constructor(
        message: string,
        public readonly retryAfterMs?: number
    ) {
        super(ErrorCode.RATE_LIMITED, message, 429);
        this.name = "RateLimitError";
        Object.setPrototypeOf(this, RateLimitError.prototype);
    }
}

/**
 * Problems with the data being processed rather than with a remote service.
 */
export class DataError extends AppError {
    constructor(
        code: ErrorCode,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(code, ErrorCategory.RECOVERABLE, message, details);
        this.name = "DataError";
        Object.setPrototypeOf(this, DataError.prototype);
    }
}

export class ValidationError extends DataError {
    constructor(
        code: ErrorCode,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(code, message, details);
        this.category = ErrorCategory.FATAL;
        this.name = "ValidationError";
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

export class ConfigurationError extends AppError {
    constructor(
        message: string,
        public readonly issues: string[] = [],
        code: ErrorCode = ErrorCode.INVALID_CONFIG
    ) {
        super(code, ErrorCategory.FATAL, message, { issues });
        this.name = "ConfigurationError";
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

const TRANSIENT_TRANSPORT_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

function categorizeApiFailure(
    status?: number,
    transportCode?: string
): ErrorCategory {
    if (status === 401 || status === 403) {
        return ErrorCategory.FATAL;
    }
    if (status === 429 || (status !== undefined && status >= 500)) {
        return ErrorCategory.TRANSIENT;
    }
    if (transportCode && TRANSIENT_TRANSPORT_CODES.has(transportCode)) {
        return ErrorCategory.TRANSIENT;
    }
    return ErrorCategory.RECOVERABLE;
}

function readNodeErrorCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err) {
        const { code } = err;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

function readMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a Node.js error in an AppError
 */
export function wrapNodeError(
    err: unknown,
    context: string,
    operation: "read" | "write" = "read"
): AppError {
    const code = readNodeErrorCode(err);
    const details = { originalError: readMessage(err) };

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.FATAL,
            `File not found: ${context}`,
            details
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    if (operation === "write") {
        return new AppError(
            ErrorCode.FILE_WRITE_ERROR,
            ErrorCategory.RECOVERABLE,
            `Failed to write file: ${context}`,
            details
        );
    }

    // Generic file read error
    return new AppError(
        ErrorCode.FILE_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `Failed to read file: ${context}`,
        details
    );
}
