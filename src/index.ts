import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { logger, setLogLevel } from "./utils/logger";
import type { PlaybackManagerDependencies } from "./services/playbackManager/collaborators";
import { PushMediaPlayerEventSource } from "./services/playbackManager/mediaPlayerEvents";
import { PlaybackManager } from "./services/playbackManager/playbackManager";

export * from "./services/playbackManager/types";
export type * from "./services/playbackManager/collaborators";
export { PlaybackManager } from "./services/playbackManager/playbackManager";
export {
    PushMediaPlayerEventSource,
    parseMediaPlayerEvent,
} from "./services/playbackManager/mediaPlayerEvents";
export { createApp } from "./app";
export { loadConfig } from "./config";
export { AppError, ErrorCategory, ErrorCode } from "./utils/errors";

export interface PlaybackServer {
    config: AppConfig;
    manager: PlaybackManager;
    eventSource: PushMediaPlayerEventSource;
    server: Server;
    close(): Promise<void>;
}

/**
 * Boots the playback manager with an HTTP-fed player and serves its API.
 * `onPlayerCancel` is called when tracking of the current video must stop.
 */
export async function startPlaybackServer(
    dependencies: PlaybackManagerDependencies,
    onPlayerCancel: () => void = () => undefined
): Promise<PlaybackServer> {
    const config = loadConfig();
    if (config.logLevel) {
        setLogLevel(config.logLevel);
    }

    const manager = new PlaybackManager(dependencies, {
        presenceEnabled: config.playback.presenceEnabled,
        offline: config.playback.offline,
        subscriberMailboxSize: config.playback.subscriberMailboxSize,
        backgroundBacklogWarn: config.playback.backgroundBacklogWarn,
        backgroundTaskTimeoutMs: config.playback.backgroundTaskTimeoutMs,
    });
    const eventSource = new PushMediaPlayerEventSource(onPlayerCancel);
    await manager.start(eventSource);

    const app = createApp({ config, manager, eventSource });
    const server = await new Promise<Server>((resolve) => {
        const listening = app.listen(config.port, () => resolve(listening));
    });
    logger.info(`Playback sync engine listening on port ${config.port}`);

    return {
        config,
        manager,
        eventSource,
        server,
        close: async () => {
            await new Promise<void>((resolve, reject) =>
                server.close((error) => (error ? reject(error) : resolve()))
            );
            await manager.stop();
            await manager.drain();
        },
    };
}
