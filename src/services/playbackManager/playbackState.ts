import type {
    LocalFilePlayback,
    PlaybackSession,
    StreamSession,
} from "./playbackSession";
import {
    emptyPlaybackState,
    STREAM_FILENAME,
    type MediaPlayerStatus,
    type PlaybackState,
    type PresenceActivity,
} from "./types";

/** Snapshot for a local file; zero state until the file has been resolved. */
export function projectLocalFileState(
    playback: LocalFilePlayback | null,
    status: MediaPlayerStatus
): PlaybackState {
    if (!playback) {
        return emptyPlaybackState();
    }

    const { listEntry, localFile, collection } = playback;
    const media = listEntry.media;

    return {
        episodeNumber: collection.getProgressNumber(localFile),
        catalogEpisode: localFile.catalogEpisode,
        mediaTitle: media.title,
        mediaTotalEpisodes: media.currentEpisodeCount,
        mediaCoverImage: media.coverImage,
        mediaId: media.id,
        filename: status.filename,
        completionPercentage: status.completionPercentage,
        canPlayNext: collection.findNextEpisode(localFile) !== null,
        progressUpdated: false,
    };
}

/** Snapshot for a stream. Streams never advance a queue, so `canPlayNext` is false. */
export function projectStreamState(
    session: StreamSession | null,
    status: MediaPlayerStatus
): PlaybackState {
    if (!session || session.catalogEpisode === null) {
        return emptyPlaybackState();
    }

    return {
        episodeNumber: session.episode.progressNumber,
        catalogEpisode: session.catalogEpisode,
        mediaTitle: session.media.title,
        mediaTotalEpisodes: session.media.currentEpisodeCount,
        mediaCoverImage: session.media.coverImage,
        mediaId: session.media.id,
        filename: status.filename || STREAM_FILENAME,
        completionPercentage: status.completionPercentage,
        canPlayNext: false,
        progressUpdated: false,
    };
}

export function projectPlaybackState(
    session: PlaybackSession,
    status: MediaPlayerStatus
): PlaybackState {
    switch (session.type) {
        case "localFile":
            return projectLocalFileState(session.playback, status);
        case "stream":
            return projectStreamState(session, status);
        default:
            return emptyPlaybackState();
    }
}

export function buildPresenceActivity(
    session: PlaybackSession,
    status: MediaPlayerStatus
): PresenceActivity | null {
    const timing = {
        progress: Math.trunc(status.currentTimeInSeconds),
        duration: Math.trunc(status.durationInSeconds),
    };

    if (session.type === "localFile" && session.playback) {
        const { listEntry, localFile, collection } = session.playback;
        return {
            mediaId: listEntry.media.id,
            title: listEntry.media.title,
            image: listEntry.media.coverImage,
            isMovie: listEntry.media.isMovie,
            episodeNumber: collection.getProgressNumber(localFile),
            ...timing,
        };
    }

    if (session.type === "stream") {
        return {
            mediaId: session.media.id,
            title: session.media.title,
            image: session.media.coverImage,
            isMovie: session.media.isMovie,
            episodeNumber: session.episode.progressNumber,
            ...timing,
        };
    }

    return null;
}
