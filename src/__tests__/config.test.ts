const mockDotenvConfig = jest.fn();

jest.mock("dotenv", () => ({
    __esModule: true,
    default: {
        config: (...args: unknown[]) => mockDotenvConfig(...args),
    },
}));

import { loadConfig } from "../config";
import { ErrorCode } from "../utils/errors";
import { isLogLevel } from "../utils/logger";

describe("loadConfig", () => {
    it("loads .env when the module is imported", () => {
        jest.isolateModules(() => {
            require("../config");
        });

        expect(mockDotenvConfig).toHaveBeenCalledTimes(1);
    });

    it("applies defaults to an empty environment", () => {
        expect(loadConfig({})).toEqual({
            nodeEnv: "development",
            port: 3020,
            logLevel: undefined,
            playback: {
                presenceEnabled: true,
                offline: false,
                subscriberMailboxSize: 256,
                backgroundBacklogWarn: 100,
                backgroundTaskTimeoutMs: 30000,
            },
        });
    });

    it("reads playback settings", () => {
        const config = loadConfig({
            NODE_ENV: "production",
            PORT: "8080",
            LOG_LEVEL: " WARN ",
            PLAYBACK_PRESENCE_ENABLED: "false",
            PLAYBACK_OFFLINE: "true",
            PLAYBACK_SUBSCRIBER_MAILBOX_SIZE: "32",
            PLAYBACK_BACKGROUND_TASK_TIMEOUT_MS: "5000",
        });

        expect(config.nodeEnv).toBe("production");
        expect(config.port).toBe(8080);
        expect(config.logLevel).toBe("warn");
        expect(config.playback).toEqual({
            presenceEnabled: false,
            offline: true,
            subscriberMailboxSize: 32,
            backgroundBacklogWarn: 100,
            backgroundTaskTimeoutMs: 5000,
        });
    });

    it("rejects a log level that only exists on the object prototype", () => {
        expect(() => loadConfig({ LOG_LEVEL: "constructor" })).toThrow(
            expect.objectContaining({
                code: ErrorCode.INVALID_CONFIG,
                details: {
                    issues: [
                        "LOG_LEVEL: LOG_LEVEL must be one of debug, info, warn, error, silent",
                    ],
                },
            })
        );
        expect(isLogLevel("toString")).toBe(false);
        expect(isLogLevel("warn")).toBe(true);
    });

    it("reports every invalid variable", () => {
        expect(() =>
            loadConfig({ PLAYBACK_OFFLINE: "yes", PLAYBACK_SUBSCRIBER_MAILBOX_SIZE: "0" })
        ).toThrow(
            expect.objectContaining({
                code: ErrorCode.INVALID_CONFIG,
                details: {
                    issues: [
                        expect.stringMatching(/^PLAYBACK_OFFLINE: /),
                        expect.stringMatching(/^PLAYBACK_SUBSCRIBER_MAILBOX_SIZE: /),
                    ],
                },
            })
        );
    });
});
