import express, { type Express } from "express";
import type { AppConfig } from "./config";
import { createErrorHandler } from "./middleware/errorHandler";
import { createPlaybackManagerRouter } from "./routes/playbackManager";
import type { PlaybackManager } from "./services/playbackManager/playbackManager";
import type { PushMediaPlayerEventSource } from "./services/playbackManager/mediaPlayerEvents";

export interface AppContext {
    config: AppConfig;
    manager: PlaybackManager;
    eventSource?: PushMediaPlayerEventSource;
}

export function createApp({ config, manager, eventSource }: AppContext): Express {
    const app = express();
    app.use(express.json());

    app.get("/health", (_req, res) => {
        res.json({
            status: "ok",
            playbackManager: manager.isRunning ? "listening" : "idle",
        });
    });

    app.use("/api/playback-manager", createPlaybackManagerRouter(manager, eventSource));
    app.use(createErrorHandler(config.nodeEnv));

    return app;
}
