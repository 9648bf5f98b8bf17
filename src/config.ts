import dotenv from "dotenv";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { isLogLevel, type LogLevel } from "./utils/logger";

dotenv.config();

const envFlag = (fallback: boolean) =>
    z
        .enum(["true", "false"])
        .optional()
        .transform((value) => (value === undefined ? fallback : value === "true"));

const envInt = (fallback: number, min: number) =>
    z.coerce.number().int().min(min).optional().default(fallback);

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).optional().default("development"),
    PORT: envInt(3020, 1),
    LOG_LEVEL: z
        .string()
        .trim()
        .toLowerCase()
        .refine(isLogLevel, "LOG_LEVEL must be one of debug, info, warn, error, silent")
        .optional(),
    // Presence is only reported when enabled and the app is not in offline mode
    PLAYBACK_PRESENCE_ENABLED: envFlag(true),
    PLAYBACK_OFFLINE: envFlag(false),
    PLAYBACK_SUBSCRIBER_MAILBOX_SIZE: envInt(256, 1),
    PLAYBACK_BACKGROUND_BACKLOG_WARN: envInt(100, 1),
    PLAYBACK_BACKGROUND_TASK_TIMEOUT_MS: envInt(30000, 1),
});

/** Runtime configuration for the playback sync engine and its HTTP surface. */
export interface AppConfig {
    nodeEnv: "development" | "production" | "test";
    port: number;
    logLevel: LogLevel | undefined;
    playback: {
        presenceEnabled: boolean;
        offline: boolean;
        subscriberMailboxSize: number;
        backgroundBacklogWarn: number;
        backgroundTaskTimeoutMs: number;
    };
}

/**
 * Validates the environment and builds the config object.
 * Throws an INVALID_CONFIG AppError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Environment validation failed: ${issues.join("; ")}`,
            { issues }
        );
    }

    const values = parsed.data;

    return {
        nodeEnv: values.NODE_ENV,
        port: values.PORT,
        logLevel: values.LOG_LEVEL,
        playback: {
            presenceEnabled: values.PLAYBACK_PRESENCE_ENABLED,
            offline: values.PLAYBACK_OFFLINE,
            subscriberMailboxSize: values.PLAYBACK_SUBSCRIBER_MAILBOX_SIZE,
            backgroundBacklogWarn: values.PLAYBACK_BACKGROUND_BACKLOG_WARN,
            backgroundTaskTimeoutMs: values.PLAYBACK_BACKGROUND_TASK_TIMEOUT_MS,
        },
    };
}
