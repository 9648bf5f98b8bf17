import type {
    LocalFile,
    LocalFileCollection,
    ManualTrackingState,
    Media,
    MediaListEntry,
    MediaPlayerStatus,
    PlaybackState,
    PlaybackType,
    StreamEpisode,
} from "./types";

// ---------------------------------------------------------------------------
// Session variants
// ---------------------------------------------------------------------------

export interface LocalFilePlayback {
    listEntry: MediaListEntry;
    localFile: LocalFile;
    collection: LocalFileCollection;
}

export interface LocalFileSession {
    type: "localFile";
    /** Null until the library has resolved the file that started tracking. */
    playback: LocalFilePlayback | null;
}

export interface StreamSession {
    type: "stream";
    media: Media;
    episode: StreamEpisode;
    catalogEpisode: string | null;
    /** Absent when the streamed media is not in the user's library. */
    listEntry: MediaListEntry | null;
}

export interface ManualTrackingSession {
    type: "manualTracking";
    tracking: ManualTrackingState;
    /** Ends manual tracking; runs once progress has been pushed. */
    cancel: () => void;
}

export type PlaybackSession =
    | { type: "none" }
    | LocalFileSession
    | StreamSession
    | ManualTrackingSession;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Current session, last player status and the per-tracking-session history.
 *
 * Only the playback manager mutates it, and only from inside its exclusive
 * session lock.
 */
export class PlaybackSessionStore {
    private current: PlaybackSession = { type: "none" };
    private lastStatus: MediaPlayerStatus | null = null;
    private history = new Map<string, PlaybackState>();
    private nextEpisode: LocalFile | null = null;

    get session(): PlaybackSession {
        return this.current;
    }

    get playbackType(): PlaybackType | null {
        return this.current.type === "none" ? null : this.current.type;
    }

    get status(): MediaPlayerStatus | null {
        return this.lastStatus;
    }

    replace(session: PlaybackSession): void {
        this.current = session;
    }

    setStatus(status: MediaPlayerStatus): void {
        this.lastStatus = status;
    }

    localPlayback(): LocalFilePlayback | null {
        return this.current.type === "localFile" ? this.current.playback : null;
    }

    streamSession(): StreamSession | null {
        return this.current.type === "stream" ? this.current : null;
    }

    manualTracking(): ManualTrackingSession | null {
        return this.current.type === "manualTracking" ? this.current : null;
    }

    // History ---------------------------------------------------------------

    resetHistory(): void {
        this.history = new Map();
    }

    recordHistory(filename: string, state: PlaybackState): void {
        this.history.set(filename, { ...state });
    }

    getHistory(filename: string): PlaybackState | undefined {
        return this.history.get(filename);
    }

    // Next episode ----------------------------------------------------------

    setNextEpisode(file: LocalFile | null): void {
        this.nextEpisode = file;
    }

    getNextEpisode(): LocalFile | null {
        return this.nextEpisode;
    }
}
