/**
 * Playback manager: turns media-player events into the canonical playback
 * state, fans it out to subscribers and the client, and pushes watch progress
 * to the tracking platform.
 *
 * One consumer loop per attached player. Every handler, and every public
 * operation that touches the session, runs on the exclusive session lock (a
 * single-concurrency queue), so no two events ever interleave. Presence,
 * episode-queue, continuity and cache-refresh calls are detached onto one
 * supervised background lane per collaborator, so a stuck collaborator only
 * holds up its own lane.
 */

import PQueue from "p-queue";
import { BackgroundTasks } from "../../utils/backgroundTasks";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    errorMessage,
    isAppError,
} from "../../utils/errors";
import { createLogger, logErrorWithContext, type Logger } from "../../utils/logger";
import type {
    MediaPlayerEventSource,
    MediaPlayerSubscription,
    PlaybackManagerDependencies,
    PresenceClient,
    ResolvedLocalFile,
} from "./collaborators";
import {
    PlaybackSessionStore,
    type ManualTrackingSession,
    type StreamSession,
} from "./playbackSession";
import {
    buildPresenceActivity,
    projectLocalFileState,
    projectPlaybackState,
    projectStreamState,
} from "./playbackState";
import {
    PlaybackSubscriberRegistry,
    type PlaybackStatusSubscriber,
} from "./playbackSubscribers";
import { ProgressSync } from "./progressSync";
import {
    ClientEvent,
    emptyPlaybackState,
    type LocalFile,
    type ManualTrackingState,
    type Media,
    type MediaListEntry,
    type MediaPlayerEvent,
    type MediaPlayerStatus,
    type PlaybackState,
    type PlaybackType,
    type StreamEpisode,
} from "./types";

export interface PlaybackManagerOptions {
    presenceEnabled: boolean;
    /** Offline mode suppresses presence reporting. */
    offline: boolean;
    subscriberMailboxSize?: number;
    backgroundBacklogWarn?: number;
    /** Milliseconds after which a detached collaborator call is abandoned. */
    backgroundTaskTimeoutMs?: number;
    logger?: Logger;
}

type BackgroundLane = "presence" | "episodeQueue" | "continuity" | "refresh";

const BACKGROUND_LANES: readonly BackgroundLane[] = [
    "presence",
    "episodeQueue",
    "continuity",
    "refresh",
];

export interface StreamPlaybackRequest {
    media: Media;
    episode: StreamEpisode;
    catalogEpisode?: string | null;
}

interface ConsumerLoop {
    controller: AbortController;
    done: Promise<void>;
}

export class PlaybackManager {
    private readonly store = new PlaybackSessionStore();
    private readonly lock = new PQueue({ concurrency: 1 });
    private readonly background: Record<BackgroundLane, BackgroundTasks>;
    private readonly subscribers: PlaybackSubscriberRegistry;
    private readonly progressSync: ProgressSync;
    private readonly log: Logger;
    private eventSource: MediaPlayerEventSource | null = null;
    private loop: ConsumerLoop | null = null;
    private currentEpoch = 0;

    constructor(
        private readonly deps: PlaybackManagerDependencies,
        private readonly options: PlaybackManagerOptions
    ) {
        this.log = options.logger ?? createLogger("playback-manager");
        const lane = (name: BackgroundLane) =>
            new BackgroundTasks(`playback-manager.${name}`, {
                backlogWarnThreshold: options.backgroundBacklogWarn,
                timeoutMs: options.backgroundTaskTimeoutMs,
                logger: this.log.child(`background.${name}`),
            });
        this.background = {
            presence: lane("presence"),
            episodeQueue: lane("episodeQueue"),
            continuity: lane("continuity"),
            refresh: lane("refresh"),
        };
        this.subscribers = new PlaybackSubscriberRegistry({
            mailboxSize: options.subscriberMailboxSize,
            logger: this.log.child("subscribers"),
        });
        this.progressSync = new ProgressSync({
            platform: deps.platform,
            refreshCollection: deps.refreshCollection,
            notifier: deps.notifier,
            preferences: deps.preferences,
            background: this.background.refresh,
            logger: this.log.child("sync"),
        });
    }

    // -----------------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------------

    /**
     * Attaches a player. The previous consumer loop is stopped and queued
     * handlers and subscriber fan-out drain before the new session epoch
     * begins, so subscribers never see deliveries from two players
     * interleave. Detached collaborator calls are not waited for.
     */
    async start(source: MediaPlayerEventSource): Promise<void> {
        await this.stop();
        await this.lock.onIdle();
        await this.subscribers.drain();

        this.currentEpoch++;
        this.eventSource = source;

        const controller = new AbortController();
        const subscription = source.subscribe();
        controller.signal.addEventListener("abort", () => subscription.close(), {
            once: true,
        });

        this.loop = {
            controller,
            done: this.consume(subscription, controller.signal),
        };
        this.log.debug(`Listening to media player events (epoch ${this.currentEpoch})`);
    }

    /** Stops the consumer loop; a handler already running finishes first. */
    async stop(): Promise<void> {
        const loop = this.loop;
        if (!loop) {
            return;
        }
        this.loop = null;
        loop.controller.abort();
        await loop.done;
    }

    /** Waits for queued handlers, subscriber deliveries and detached work. */
    async drain(): Promise<void> {
        await this.lock.onIdle();
        await this.subscribers.drain();
        await Promise.all(BACKGROUND_LANES.map((name) => this.background[name].drain()));
    }

    get epoch(): number {
        return this.currentEpoch;
    }

    get isRunning(): boolean {
        return this.loop !== null;
    }

    private async consume(
        subscription: MediaPlayerSubscription,
        signal: AbortSignal
    ): Promise<void> {
        try {
            for await (const event of subscription.events) {
                if (signal.aborted) break;
                await this.handleEvent(event);
            }
        } catch (error) {
            logErrorWithContext(this.log, "Media player event loop failed", error);
        } finally {
            subscription.close();
        }
    }

    // -----------------------------------------------------------------------
    // Subscribers
    // -----------------------------------------------------------------------

    subscribe(id?: string): PlaybackStatusSubscriber {
        return this.subscribers.subscribe(id);
    }

    unsubscribe(id: string): void {
        this.subscribers.unsubscribe(id);
    }

    // -----------------------------------------------------------------------
    // Dispatch
    // -----------------------------------------------------------------------

    /** Handles one player event under the session lock. Never rejects. */
    handleEvent(event: MediaPlayerEvent): Promise<void> {
        return this.exclusive(async () => {
            try {
                await this.dispatch(event);
            } catch (error) {
                logErrorWithContext(this.log, `Failed to handle ${event.type} event`, error);
            }
        });
    }

    private async dispatch(event: MediaPlayerEvent): Promise<void> {
        switch (event.type) {
            case "tracking-started":
                return this.handleTrackingStarted(event.status);
            case "video-completed":
                return this.handleVideoCompleted(event.status);
            case "tracking-stopped":
                return this.handleTrackingStopped(event.reason);
            case "playback-status":
                return this.handlePlaybackStatus(event.status);
            case "tracking-retry":
                return this.handleTrackingRetry(event.reason);
            case "streaming-tracking-started":
                return this.handleStreamingTrackingStarted(event.status);
            case "streaming-playback-status":
                return this.handleStreamingPlaybackStatus(event.status);
            case "streaming-video-completed":
                return this.handleStreamingVideoCompleted(event.status);
            case "streaming-tracking-stopped":
                return this.handleStreamingTrackingStopped(event.reason);
            case "streaming-tracking-retry":
                return;
        }
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        return this.lock.add(task);
    }

    // -----------------------------------------------------------------------
    // Local file handlers
    // -----------------------------------------------------------------------

    private async handleTrackingStarted(status: MediaPlayerStatus): Promise<void> {
        this.store.replace({ type: "localFile", playback: null });
        this.store.resetHistory();
        this.store.setNextEpisode(null);
        this.store.setStatus(status);
        this.log.debug("Tracking started, extracting metadata...");

        let playback: ResolvedLocalFile;
        try {
            playback = await this.deps.library.resolveLocalFile(status.filename);
        } catch (error) {
            const resolutionError = isAppError(error)
                ? error
                : new AppError(
                      ErrorCode.MEDIA_DATA_NOT_FOUND,
                      ErrorCategory.RECOVERABLE,
                      `Media data not found for ${status.filename}`,
                      { originalError: errorMessage(error) }
                  );
            logErrorWithContext(this.log, "Failed to get media data", resolutionError, {
                filename: status.filename,
            });
            this.deps.notifier.sendEvent(ClientEvent.ErrorToast, resolutionError.message);
            this.eventSource?.cancel();
            return;
        }

        const session = { type: "localFile" as const, playback };
        this.store.replace(session);
        const state = projectLocalFileState(playback, status);
        const { listEntry, localFile } = playback;

        this.deps.notifier.sendEvent(ClientEvent.ProgressTrackingStarted, { ...state });
        this.subscribers.broadcast(
            this.statusChanged(status, state),
            {
                type: "video-started",
                filename: status.filename,
                filepath: status.filepath,
                epoch: this.currentEpoch,
            }
        );
        this.log.debug("Playback started", {
            media: listEntry.media.title,
            episode: localFile.episodeNumber,
        });

        const { continuity, episodeQueue } = this.deps;
        this.background.continuity.run("continuity.set-episode-details", () =>
            continuity.setExternalEpisodeDetails({
                episodeNumber: localFile.episodeNumber,
                mediaId: listEntry.media.id,
                filepath: localFile.path,
            })
        );
        this.background.episodeQueue.run("episode-queue.video-start", () =>
            episodeQueue.onVideoStart(listEntry, localFile, { ...state })
        );

        this.setPresenceActivity(buildPresenceActivity(session, status));
    }

    private async handleVideoCompleted(status: MediaPlayerStatus): Promise<void> {
        this.store.setStatus(status);
        const playback = this.store.localPlayback();
        const state = projectLocalFileState(playback, status);
        this.log.debug("Received video completed event");

        this.subscribers.broadcast(this.statusChanged(status, state), {
            type: "video-completed",
            filename: status.filename,
            epoch: this.currentEpoch,
        });

        if (playback) {
            await this.progressSync.autoSync(this.store.session, state);
        }

        // The client uses `progressUpdated` to tell the user about the sync
        this.deps.notifier.sendEvent(ClientEvent.ProgressVideoCompleted, { ...state });
        this.store.recordHistory(status.filename, state);

        if (playback) {
            const { episodeQueue } = this.deps;
            this.background.episodeQueue.run("episode-queue.video-completed", () =>
                episodeQueue.onVideoCompleted(playback.listEntry, playback.localFile, { ...state })
            );
        }
    }

    private async handleTrackingStopped(reason: string): Promise<void> {
        this.log.debug("Received tracking stopped event");
        this.deps.notifier.sendEvent(ClientEvent.ProgressTrackingStopped, reason);

        const playback = this.store.localPlayback();
        if (playback) {
            this.store.setNextEpisode(playback.collection.findNextEpisode(playback.localFile));
        }

        this.subscribers.broadcast({ type: "video-stopped", reason, epoch: this.currentEpoch });

        this.recordWatchHistory();
        const { episodeQueue } = this.deps;
        this.background.episodeQueue.run("episode-queue.tracking-stopped", () =>
            episodeQueue.onTrackingStopped()
        );
        this.closePresence();
    }

    private async handlePlaybackStatus(status: MediaPlayerStatus): Promise<void> {
        this.store.setStatus(status);
        const playback = this.store.localPlayback();
        const state = this.withRecordedProgress(
            projectLocalFileState(playback, status),
            status.filename
        );

        this.subscribers.broadcast(this.statusChanged(status, state));
        this.deps.notifier.sendEvent(ClientEvent.ProgressPlaybackState, { ...state });

        if (playback) {
            const { episodeQueue } = this.deps;
            this.background.episodeQueue.run("episode-queue.playback-status", () =>
                episodeQueue.onPlaybackStatus(playback.listEntry, playback.localFile, { ...state })
            );
        }

        this.updatePresence(status);
    }

    private async handleTrackingRetry(reason: string): Promise<void> {
        // Not sent to the client. The player most likely closed, so the queue
        // may move on to the next episode.
        this.log.debug(`Tracking retry: ${reason}`);
        const { episodeQueue } = this.deps;
        this.background.episodeQueue.run("episode-queue.tracking-error", () =>
            episodeQueue.onTrackingError()
        );
    }

    // -----------------------------------------------------------------------
    // Stream handlers
    // -----------------------------------------------------------------------

    private async handleStreamingTrackingStarted(status: MediaPlayerStatus): Promise<void> {
        const current = this.store.streamSession();
        if (!current) {
            this.log.debug("Ignoring stream tracking start, no active stream");
            return;
        }

        // The streamed media might not be in the library
        let listEntry: MediaListEntry | null = null;
        try {
            listEntry = await this.deps.library.findListEntry(current.media.id);
        } catch (error) {
            this.log.warn(`Could not look up list entry for media ${current.media.id}`, error);
        }

        const session: StreamSession = { ...current, listEntry };
        this.store.replace(session);
        this.store.resetHistory();
        this.store.setStatus(status);
        const state = projectStreamState(session, status);

        this.subscribers.broadcast(this.statusChanged(status, state), {
            type: "stream-started",
            filename: status.filename,
            filepath: status.filepath,
            epoch: this.currentEpoch,
        });

        this.log.debug("Tracking started for stream");
        this.deps.notifier.sendEvent(ClientEvent.ProgressTrackingStarted, { ...state });

        const { continuity } = this.deps;
        this.background.continuity.run("continuity.set-episode-details", () =>
            continuity.setExternalEpisodeDetails({
                episodeNumber: session.episode.progressNumber,
                mediaId: session.media.id,
                filepath: "",
            })
        );

        this.setPresenceActivity(buildPresenceActivity(session, status));
    }

    private async handleStreamingPlaybackStatus(status: MediaPlayerStatus): Promise<void> {
        const session = this.store.streamSession();
        if (!session) {
            return;
        }

        this.store.setStatus(status);
        const state = this.withRecordedProgress(
            projectStreamState(session, status),
            status.filename
        );

        this.subscribers.broadcast(this.statusChanged(status, state));
        this.deps.notifier.sendEvent(ClientEvent.ProgressPlaybackState, { ...state });
        this.updatePresence(status);
    }

    private async handleStreamingVideoCompleted(status: MediaPlayerStatus): Promise<void> {
        const session = this.store.streamSession();
        if (!session) {
            return;
        }

        this.store.setStatus(status);
        const state = projectStreamState(session, status);
        this.log.debug("Received stream completed event");

        this.subscribers.broadcast(this.statusChanged(status, state), {
            type: "stream-completed",
            filename: status.filename,
            epoch: this.currentEpoch,
        });

        await this.progressSync.autoSync(session, state);

        this.deps.notifier.sendEvent(ClientEvent.ProgressVideoCompleted, { ...state });
        this.store.recordHistory(status.filename, state);
    }

    private async handleStreamingTrackingStopped(reason: string): Promise<void> {
        if (!this.store.streamSession()) {
            return;
        }

        this.recordWatchHistory();
        this.subscribers.broadcast({ type: "stream-stopped", reason, epoch: this.currentEpoch });

        this.log.debug("Received stream tracking stopped event");
        this.deps.notifier.sendEvent(ClientEvent.ProgressTrackingStopped, reason);
        this.closePresence();
    }

    // -----------------------------------------------------------------------
    // Session control
    // -----------------------------------------------------------------------

    /** Makes a stream the current session ahead of its tracking events. */
    startStream(request: StreamPlaybackRequest): Promise<void> {
        return this.exclusive(async () => {
            this.endManualTracking();
            this.store.replace({
                type: "stream",
                media: request.media,
                episode: request.episode,
                catalogEpisode: request.catalogEpisode ?? null,
                listEntry: null,
            });
            this.log.debug(`Stream prepared for media ${request.media.id}`);
        });
    }

    /**
     * Tracks progress for media played outside a monitored player. The
     * session ends after its progress is pushed or on `cancelManualTracking`.
     */
    startManualTracking(
        tracking: ManualTrackingState,
        onCancel?: () => void
    ): Promise<void> {
        return this.exclusive(async () => {
            this.endManualTracking();

            const session: ManualTrackingSession = {
                type: "manualTracking",
                tracking: { ...tracking },
                cancel: () => {
                    if (this.store.session === session) {
                        this.store.replace({ type: "none" });
                    }
                    onCancel?.();
                },
            };
            this.store.replace(session);
            this.log.debug("Manual tracking started", { ...tracking });
        });
    }

    cancelManualTracking(): Promise<boolean> {
        return this.exclusive(async () => this.endManualTracking());
    }

    private endManualTracking(): boolean {
        const manual = this.store.manualTracking();
        if (!manual) {
            return false;
        }
        manual.cancel();
        return true;
    }

    /**
     * Pushes the current progress on user request, skipping the regression
     * checks of automatic sync. Rejects when the push fails; on success the
     * history entry is stamped and the client told.
     */
    syncCurrentProgress(): Promise<PlaybackState> {
        return this.exclusive(async () => {
            const session = this.store.session;
            await this.progressSync.updateProgress(session);

            const status = this.store.status;
            if (!status) {
                return { ...emptyPlaybackState(), progressUpdated: true };
            }

            const state: PlaybackState = {
                ...projectPlaybackState(session, status),
                progressUpdated: true,
            };
            this.store.recordHistory(status.filename, state);
            this.deps.notifier.sendEvent(ClientEvent.ProgressUpdated, { ...state });
            return state;
        });
    }

    // -----------------------------------------------------------------------
    // Read accessors
    // -----------------------------------------------------------------------

    getCurrentPlaybackState(): PlaybackState {
        const status = this.store.status;
        if (!status) {
            return emptyPlaybackState();
        }
        return this.withRecordedProgress(
            projectPlaybackState(this.store.session, status),
            status.filename
        );
    }

    getPlaybackType(): PlaybackType | null {
        return this.store.playbackType;
    }

    /** Next local episode, known once tracking of the current one stopped. */
    getNextEpisode(): LocalFile | null {
        return this.store.getNextEpisode();
    }

    // -----------------------------------------------------------------------
    // Helpers
    // -----------------------------------------------------------------------

    private statusChanged(status: MediaPlayerStatus, state: PlaybackState) {
        return {
            type: "playback-status-changed" as const,
            status: { ...status },
            state: { ...state },
            epoch: this.currentEpoch,
        };
    }

    /** A status tick never updates progress itself; keep what completion recorded. */
    private withRecordedProgress(state: PlaybackState, filename: string): PlaybackState {
        const previous = this.store.getHistory(filename);
        if (previous) {
            state.progressUpdated = previous.progressUpdated;
        }
        return state;
    }

    private recordWatchHistory(): void {
        const status = this.store.status;
        if (!status) {
            return;
        }
        const { continuity } = this.deps;
        this.background.continuity.run("continuity.update-watch-history", () =>
            continuity.updateWatchHistory(status.currentTimeInSeconds, status.durationInSeconds)
        );
    }

    private presenceClient(): PresenceClient | null {
        if (!this.options.presenceEnabled || this.options.offline) {
            return null;
        }
        return this.deps.presence;
    }

    private setPresenceActivity(activity: ReturnType<typeof buildPresenceActivity>): void {
        const presence = this.presenceClient();
        if (!presence || !activity) {
            return;
        }
        this.background.presence.run("presence.set-activity", () =>
            presence.setActivity(activity)
        );
    }

    private updatePresence(status: MediaPlayerStatus): void {
        const presence = this.presenceClient();
        if (!presence) {
            return;
        }
        this.background.presence.run("presence.update-activity", () =>
            presence.updateActivity(
                Math.trunc(status.currentTimeInSeconds),
                Math.trunc(status.durationInSeconds),
                !status.playing
            )
        );
    }

    private closePresence(): void {
        const presence = this.presenceClient();
        if (!presence) {
            return;
        }
        this.background.presence.run("presence.close", () => presence.close());
    }
}
