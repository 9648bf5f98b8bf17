import type {
    ClientEventKind,
    ClientEventPayloads,
    LocalFile,
    LocalFileCollection,
    MediaListEntry,
    MediaPlayerEvent,
    PlaybackState,
    PresenceActivity,
} from "./types";

/**
 * Contracts the playback manager needs from the rest of the application.
 * Implementations live outside this module; tests use in-process fakes.
 */

export interface MediaPlayerSubscription {
    events: AsyncIterable<MediaPlayerEvent>;
    close(): void;
}

export interface MediaPlayerEventSource {
    subscribe(): MediaPlayerSubscription;
    /** Stops tracking the current video in the underlying player. */
    cancel(): void;
}

export interface ResolvedLocalFile {
    listEntry: MediaListEntry;
    localFile: LocalFile;
    collection: LocalFileCollection;
}

export interface LibraryResolver {
    /** Rejects when the file does not belong to a media title in the library. */
    resolveLocalFile(filename: string): Promise<ResolvedLocalFile>;
    /** The user's list entry for a media, if the media is in the library. */
    findListEntry(mediaId: number): Promise<MediaListEntry | null>;
}

export interface ProgressTrackingPlatform {
    updateEntryProgress(
        mediaId: number,
        episodeNumber: number,
        totalEpisodes: number | null
    ): Promise<void>;
}

export interface PresenceClient {
    setActivity(activity: PresenceActivity): Promise<void> | void;
    updateActivity(progress: number, duration: number, paused: boolean): Promise<void> | void;
    close(): Promise<void> | void;
}

export interface ContinuityStore {
    setExternalEpisodeDetails(details: {
        episodeNumber: number;
        mediaId: number;
        filepath: string;
    }): Promise<void> | void;
    updateWatchHistory(currentTime: number, duration: number): Promise<void> | void;
}

export interface EpisodeQueueAdvancer {
    onVideoStart(listEntry: MediaListEntry, file: LocalFile, state: PlaybackState): Promise<void> | void;
    onVideoCompleted(listEntry: MediaListEntry, file: LocalFile, state: PlaybackState): Promise<void> | void;
    onPlaybackStatus(listEntry: MediaListEntry, file: LocalFile, state: PlaybackState): Promise<void> | void;
    onTrackingStopped(): Promise<void> | void;
    onTrackingError(): Promise<void> | void;
}

export interface ClientNotifier {
    sendEvent<K extends ClientEventKind>(kind: K, payload: ClientEventPayloads[K]): void;
}

export interface PreferenceStore {
    isAutoUpdateProgressEnabled(): Promise<boolean>;
}

export interface PlaybackManagerDependencies {
    library: LibraryResolver;
    platform: ProgressTrackingPlatform;
    /** Fire-and-forget refresh of the cached platform collection. */
    refreshCollection: () => Promise<void> | void;
    notifier: ClientNotifier;
    preferences: PreferenceStore;
    continuity: ContinuityStore;
    episodeQueue: EpisodeQueueAdvancer;
    /** Null when presence reporting is not configured. */
    presence: PresenceClient | null;
}
