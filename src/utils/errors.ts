/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the input or session and retry
    TRANSIENT = "TRANSIENT", // External service or storage hiccup
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Session resolution errors
    MEDIA_DATA_NOT_FOUND = "MEDIA_DATA_NOT_FOUND",
    INVALID_PLAYER_EVENT = "INVALID_PLAYER_EVENT",

    // Invalid session state
    NO_ACTIVE_SESSION = "NO_ACTIVE_SESSION",
    UNKNOWN_PLAYBACK_TYPE = "UNKNOWN_PLAYBACK_TYPE",
    MEDIA_ID_NOT_FOUND = "MEDIA_ID_NOT_FOUND",

    // Collaborator errors
    PREFERENCE_READ_FAILED = "PREFERENCE_READ_FAILED",
    PROGRESS_UPDATE_FAILED = "PROGRESS_UPDATE_FAILED",
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

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
    if (!(error instanceof AppError)) {
        return false;
    }
    return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Wrap an unexpected failure from the tracking platform (or while resolving
 * what to send it) in the progress-update error kind.
 */
export function wrapProgressUpdateError(
    error: unknown,
    context: Record<string, unknown> = {}
): AppError {
    if (isAppError(error, ErrorCode.PROGRESS_UPDATE_FAILED)) {
        return error;
    }

    return new AppError(
        ErrorCode.PROGRESS_UPDATE_FAILED,
        ErrorCategory.TRANSIENT,
        "Failed to update progress on the tracking platform",
        { ...context, originalError: errorMessage(error) }
    );
}
