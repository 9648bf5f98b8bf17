import type { BackgroundTasks } from "../../utils/backgroundTasks";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    isAppError,
    wrapProgressUpdateError,
} from "../../utils/errors";
import { logErrorWithContext, type Logger } from "../../utils/logger";
import type {
    ClientNotifier,
    PreferenceStore,
    ProgressTrackingPlatform,
} from "./collaborators";
import type { PlaybackSession } from "./playbackSession";
import { ClientEvent, type PlaybackState } from "./types";

export const AUTO_SYNC_FAILED_MESSAGE = "Failed to update progress on the tracking platform";

export interface ProgressTarget {
    mediaId: number;
    episodeNumber: number;
    /** Total episode count, -1 when unknown. */
    totalEpisodes: number;
}

export interface ProgressSyncDependencies {
    platform: ProgressTrackingPlatform;
    refreshCollection: () => Promise<void> | void;
    notifier: ClientNotifier;
    preferences: PreferenceStore;
    background: BackgroundTasks;
    logger: Logger;
}

function invalidState(code: ErrorCode, message: string): AppError {
    return new AppError(code, ErrorCategory.RECOVERABLE, message);
}

/**
 * Works out what to report for the active session. Invalid-state errors are
 * thrown as-is; anything unexpected while reading the session becomes a
 * progress-update error.
 */
export function resolveProgressTarget(session: PlaybackSession): ProgressTarget {
    let target: ProgressTarget;

    switch (session.type) {
        case "localFile": {
            const playback = session.playback;
            if (!playback) {
                throw invalidState(ErrorCode.NO_ACTIVE_SESSION, "No video is being watched");
            }
            try {
                target = {
                    mediaId: playback.listEntry.media.id,
                    episodeNumber: playback.collection.getProgressNumber(playback.localFile),
                    totalEpisodes: playback.listEntry.media.totalEpisodeCount,
                };
            } catch (error) {
                throw wrapProgressUpdateError(error, { playbackType: session.type });
            }
            break;
        }
        case "stream":
            target = {
                mediaId: session.media.id,
                episodeNumber: session.episode.progressNumber,
                totalEpisodes: session.media.totalEpisodeCount,
            };
            break;
        case "manualTracking":
            target = {
                mediaId: session.tracking.mediaId,
                episodeNumber: session.tracking.episodeNumber,
                totalEpisodes: session.tracking.totalEpisodes,
            };
            break;
        default:
            throw invalidState(ErrorCode.UNKNOWN_PLAYBACK_TYPE, "Unknown playback type");
    }

    if (target.mediaId === 0) {
        throw invalidState(ErrorCode.MEDIA_ID_NOT_FOUND, "Media ID not found");
    }

    return target;
}

/**
 * Whether automatic sync should push for this session. Progress never
 * regresses: an episode at or below the recorded progress is skipped.
 */
export function shouldAutoSync(session: PlaybackSession): boolean {
    switch (session.type) {
        case "localFile": {
            const playback = session.playback;
            if (!playback) return false;
            const episodeProgress = playback.collection.getProgressNumber(playback.localFile);
            return (playback.listEntry.progress ?? 0) < episodeProgress;
        }
        case "stream":
            // Without a list entry there is nothing to compare against
            if (!session.listEntry) return true;
            return (session.listEntry.progress ?? 0) < session.episode.progressNumber;
        default:
            return false;
    }
}

export class ProgressSync {
    constructor(private readonly deps: ProgressSyncDependencies) {}

    /**
     * Pushes progress for the active session to the tracking platform.
     * Throws on invalid session state or when the platform update fails.
     */
    async updateProgress(session: PlaybackSession): Promise<ProgressTarget> {
        const { platform, logger } = this.deps;
        const target = resolveProgressTarget(session);

        try {
            await platform.updateEntryProgress(
                target.mediaId,
                target.episodeNumber,
                target.totalEpisodes > 0 ? target.totalEpisodes : null
            );
        } catch (error) {
            logErrorWithContext(logger, "Error occurred while updating progress", error, {
                ...target,
            });
            throw wrapProgressUpdateError(error, { ...target });
        }

        this.deps.background.run("refresh-collection", this.deps.refreshCollection);
        logger.info("Updated progress on the tracking platform", { ...target });

        if (session.type === "manualTracking") {
            session.cancel();
        }

        return target;
    }

    /**
     * Runs once per video-completed event. Never throws: the outcome is
     * written to `state.progressUpdated` and reported to the client.
     */
    async autoSync(session: PlaybackSession, state: PlaybackState): Promise<void> {
        const { preferences, notifier, logger } = this.deps;

        let enabled: boolean;
        try {
            enabled = await preferences.isAutoUpdateProgressEnabled();
        } catch (error) {
            logErrorWithContext(
                logger,
                "Failed to check if auto update progress is enabled",
                error,
                { code: ErrorCode.PREFERENCE_READ_FAILED }
            );
            return;
        }

        if (!enabled) {
            return;
        }

        try {
            if (!shouldAutoSync(session)) {
                return;
            }

            logger.debug("Updating progress on the tracking platform");
            await this.updateProgress(session);
            state.progressUpdated = true;
            notifier.sendEvent(ClientEvent.ProgressUpdated, { ...state });
        } catch (error) {
            state.progressUpdated = false;
            if (!isAppError(error, ErrorCode.PROGRESS_UPDATE_FAILED)) {
                logErrorWithContext(logger, "Automatic progress sync failed", error);
            }
            notifier.sendEvent(ClientEvent.ErrorToast, AUTO_SYNC_FAILED_MESSAGE);
        }
    }
}
