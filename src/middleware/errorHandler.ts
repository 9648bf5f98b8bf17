import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import type { AppConfig } from "../config";

function statusCodeFor(category: ErrorCategory): number {
    switch (category) {
        case ErrorCategory.RECOVERABLE:
            return 400; // Bad Request - client can retry with changes
        case ErrorCategory.TRANSIENT:
            return 503; // Service Unavailable - client can retry later
        case ErrorCategory.FATAL:
            return 500;
    }
}

export function createErrorHandler(nodeEnv: AppConfig["nodeEnv"]): ErrorRequestHandler {
    return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof AppError) {
            logger.error(`[AppError] ${err.code}: ${err.message}`, err.details ?? {});

            res.status(statusCodeFor(err.category)).json({
                error: err.message,
                code: err.code,
                category: err.category,
                ...(nodeEnv === "development" && { details: err.details }),
            });
            return;
        }

        logger.error("Unhandled error:", err.stack);

        // Hide internals outside development
        if (nodeEnv !== "development") {
            res.status(500).json({ error: "Internal server error" });
            return;
        }

        res.status(500).json({
            error: err.message || "Internal server error",
            stack: err.stack,
        });
    };
}
