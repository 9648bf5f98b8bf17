// ---------------------------------------------------------------------------
// Library types (supplied by the library resolver)
// ---------------------------------------------------------------------------

export interface Media {
    id: number;
    title: string;
    coverImage: string;
    isMovie: boolean;
    /** Episodes released so far, -1 when unknown. */
    currentEpisodeCount: number;
    /** Planned episode count, -1 when unknown. */
    totalEpisodeCount: number;
}

/** A user's library record for a media title. */
export interface MediaListEntry {
    media: Media;
    /** Progress recorded on the tracking platform; null when never recorded. */
    progress: number | null;
}

export interface LocalFile {
    name: string;
    path: string;
    episodeNumber: number;
    /** Episode identifier in the source catalog (e.g. "S1", "5"). */
    catalogEpisode: string;
}

/** All local files of one media title. */
export interface LocalFileCollection {
    /** The user-facing episode index reported to the tracking platform. */
    getProgressNumber(file: LocalFile): number;
    findNextEpisode(file: LocalFile): LocalFile | null;
}

export interface StreamEpisode {
    progressNumber: number;
    title?: string;
}

export interface ManualTrackingState {
    mediaId: number;
    episodeNumber: number;
    totalEpisodes: number;
}

// ---------------------------------------------------------------------------
// Player status and events
// ---------------------------------------------------------------------------

export interface MediaPlayerStatus {
    filename: string;
    filepath: string;
    currentTimeInSeconds: number;
    durationInSeconds: number;
    completionPercentage: number;
    playing: boolean;
}

export type MediaPlayerEvent =
    | { type: "tracking-started"; status: MediaPlayerStatus }
    | { type: "playback-status"; status: MediaPlayerStatus }
    | { type: "video-completed"; status: MediaPlayerStatus }
    | { type: "tracking-stopped"; reason: string }
    | { type: "tracking-retry"; reason: string }
    | { type: "streaming-tracking-started"; status: MediaPlayerStatus }
    | { type: "streaming-playback-status"; status: MediaPlayerStatus }
    | { type: "streaming-video-completed"; status: MediaPlayerStatus }
    | { type: "streaming-tracking-stopped"; reason: string }
    | { type: "streaming-tracking-retry"; reason: string };

// ---------------------------------------------------------------------------
// Playback state
// ---------------------------------------------------------------------------

export type PlaybackType = "localFile" | "stream" | "manualTracking";

/** Canonical snapshot sent to clients and subscribers. */
export interface PlaybackState {
    episodeNumber: number;
    catalogEpisode: string;
    mediaTitle: string;
    mediaTotalEpisodes: number;
    mediaCoverImage: string;
    mediaId: number;
    filename: string;
    completionPercentage: number;
    canPlayNext: boolean;
    progressUpdated: boolean;
}

export const STREAM_FILENAME = "Stream";

export function emptyPlaybackState(): PlaybackState {
    return {
        episodeNumber: 0,
        catalogEpisode: "",
        mediaTitle: "",
        mediaTotalEpisodes: 0,
        mediaCoverImage: "",
        mediaId: 0,
        filename: "",
        completionPercentage: 0,
        canPlayNext: false,
        progressUpdated: false,
    };
}

// ---------------------------------------------------------------------------
// Subscriber events
// ---------------------------------------------------------------------------

type WithEpoch<T> = T & {
    /** Player session the event belongs to; bumps on every `start()`. */
    epoch: number;
};

export type PlaybackSubscriberEvent = WithEpoch<
    | { type: "playback-status-changed"; status: MediaPlayerStatus; state: PlaybackState }
    | { type: "video-started"; filename: string; filepath: string }
    | { type: "video-completed"; filename: string }
    | { type: "video-stopped"; reason: string }
    | { type: "stream-started"; filename: string; filepath: string }
    | { type: "stream-completed"; filename: string }
    | { type: "stream-stopped"; reason: string }
>;

// ---------------------------------------------------------------------------
// Outward client notifications
// ---------------------------------------------------------------------------

export const ClientEvent = {
    ErrorToast: "error-toast",
    ProgressTrackingStarted: "playback-manager-progress-tracking-started",
    ProgressVideoCompleted: "playback-manager-progress-video-completed",
    ProgressTrackingStopped: "playback-manager-progress-tracking-stopped",
    ProgressPlaybackState: "playback-manager-progress-playback-state",
    ProgressUpdated: "playback-manager-progress-updated",
} as const;

export type ClientEventKind = (typeof ClientEvent)[keyof typeof ClientEvent];

export interface ClientEventPayloads {
    "error-toast": string;
    "playback-manager-progress-tracking-started": PlaybackState;
    "playback-manager-progress-video-completed": PlaybackState;
    "playback-manager-progress-tracking-stopped": string;
    "playback-manager-progress-playback-state": PlaybackState;
    "playback-manager-progress-updated": PlaybackState;
}

// ---------------------------------------------------------------------------
// Presence
// ---------------------------------------------------------------------------

export interface PresenceActivity {
    mediaId: number;
    title: string;
    image: string;
    isMovie: boolean;
    episodeNumber: number;
    progress: number;
    duration: number;
}
