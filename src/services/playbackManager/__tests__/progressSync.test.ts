import { BackgroundTasks } from "../../../utils/backgroundTasks";
import { AppError, ErrorCode } from "../../../utils/errors";
import type { PlaybackSession, StreamSession } from "../playbackSession";
import {
    AUTO_SYNC_FAILED_MESSAGE,
    ProgressSync,
    resolveProgressTarget,
    shouldAutoSync,
} from "../progressSync";
import { emptyPlaybackState, type MediaListEntry } from "../types";
import {
    createDependencies,
    createTestLogger,
    media,
    resolvedFile,
} from "./helpers/playbackFixtures";

describe("progress sync", () => {
    const localSession = (episode: number, progress: number | null): PlaybackSession => ({
        type: "localFile",
        playback: resolvedFile(episode, { progress }),
    });

    const streamSession = (listEntry: MediaListEntry | null): StreamSession => ({
        type: "stream",
        media: media({ id: 202, totalEpisodeCount: -1 }),
        episode: { progressNumber: 4 },
        catalogEpisode: "4",
        listEntry,
    });

    function setup() {
        const harness = createDependencies();
        const background = new BackgroundTasks("test", { logger: createTestLogger() });
        const sync = new ProgressSync({
            platform: harness.platform,
            refreshCollection: harness.refreshCollection,
            notifier: harness.notifier,
            preferences: harness.preferences,
            background,
            logger: createTestLogger(),
        });
        return { ...harness, background, sync };
    }

    describe("resolveProgressTarget", () => {
        it("reads media, progress number and total from a local session", () => {
            expect(resolveProgressTarget(localSession(5, 4))).toEqual({
                mediaId: 101,
                episodeNumber: 5,
                totalEpisodes: 12,
            });
        });

        it("rejects an unresolved local session as no active session", () => {
            expect(() =>
                resolveProgressTarget({ type: "localFile", playback: null })
            ).toThrow(expect.objectContaining({ code: ErrorCode.NO_ACTIVE_SESSION }));
        });

        it("rejects an empty session as an unknown playback type", () => {
            expect(() => resolveProgressTarget({ type: "none" })).toThrow(
                expect.objectContaining({ code: ErrorCode.UNKNOWN_PLAYBACK_TYPE })
            );
        });

        it("rejects the unset media id", () => {
            expect(() =>
                resolveProgressTarget({
                    type: "manualTracking",
                    tracking: { mediaId: 0, episodeNumber: 1, totalEpisodes: 3 },
                    cancel: jest.fn(),
                })
            ).toThrow(expect.objectContaining({ code: ErrorCode.MEDIA_ID_NOT_FOUND }));
        });

        it("turns a throwing collection into a progress-update error", () => {
            const playback = resolvedFile(5);
            playback.collection.getProgressNumber = () => {
                throw new Error("index corrupted");
            };

            expect(() => resolveProgressTarget({ type: "localFile", playback })).toThrow(
                expect.objectContaining({ code: ErrorCode.PROGRESS_UPDATE_FAILED })
            );
        });
    });

    describe("shouldAutoSync", () => {
        it("only syncs local episodes above the recorded progress", () => {
            expect(shouldAutoSync(localSession(5, 4))).toBe(true);
            expect(shouldAutoSync(localSession(5, 5))).toBe(false);
            expect(shouldAutoSync(localSession(5, 7))).toBe(false);
            expect(shouldAutoSync(localSession(1, null))).toBe(true);
        });

        it("always syncs streams that are not in the library", () => {
            expect(shouldAutoSync(streamSession(null))).toBe(true);
        });

        it("skips streams whose list entry is already at the episode", () => {
            expect(shouldAutoSync(streamSession({ media: media({ id: 202 }), progress: 4 }))).toBe(
                false
            );
            expect(shouldAutoSync(streamSession({ media: media({ id: 202 }), progress: 3 }))).toBe(
                true
            );
        });

        it("never auto-syncs manual tracking", () => {
            expect(
                shouldAutoSync({
                    type: "manualTracking",
                    tracking: { mediaId: 7, episodeNumber: 2, totalEpisodes: 10 },
                    cancel: jest.fn(),
                })
            ).toBe(false);
        });
    });

    describe("updateProgress", () => {
        it("pushes the target and refreshes the collection", async () => {
            const { sync, platform, refreshCollection, background } = setup();

            await expect(sync.updateProgress(localSession(5, 4))).resolves.toEqual({
                mediaId: 101,
                episodeNumber: 5,
                totalEpisodes: 12,
            });
            await background.drain();

            expect(platform.updateEntryProgress).toHaveBeenCalledWith(101, 5, 12);
            expect(refreshCollection).toHaveBeenCalledTimes(1);
        });

        it("sends an unknown total as null", async () => {
            const { sync, platform } = setup();

            await sync.updateProgress(streamSession(null));

            expect(platform.updateEntryProgress).toHaveBeenCalledWith(202, 4, null);
        });

        it("classifies platform failures and skips the refresh", async () => {
            const { sync, platform, refreshCollection, background } = setup();
            platform.updateEntryProgress.mockRejectedValueOnce(new Error("HTTP 502"));

            const failure = sync.updateProgress(localSession(5, 4));

            await expect(failure).rejects.toBeInstanceOf(AppError);
            await expect(failure).rejects.toMatchObject({
                code: ErrorCode.PROGRESS_UPDATE_FAILED,
                details: expect.objectContaining({ originalError: "HTTP 502" }),
            });
            await background.drain();
            expect(refreshCollection).not.toHaveBeenCalled();
        });

        it("never reaches the platform for an invalid session", async () => {
            const { sync, platform } = setup();

            await expect(sync.updateProgress({ type: "none" })).rejects.toMatchObject({
                code: ErrorCode.UNKNOWN_PLAYBACK_TYPE,
            });
            expect(platform.updateEntryProgress).not.toHaveBeenCalled();
        });

        it("ends manual tracking only after a successful push", async () => {
            const { sync, platform } = setup();
            const cancel = jest.fn();
            const session: PlaybackSession = {
                type: "manualTracking",
                tracking: { mediaId: 7, episodeNumber: 2, totalEpisodes: 0 },
                cancel,
            };

            platform.updateEntryProgress.mockRejectedValueOnce(new Error("offline"));
            await expect(sync.updateProgress(session)).rejects.toThrow(AppError);
            expect(cancel).not.toHaveBeenCalled();

            await sync.updateProgress(session);
            expect(platform.updateEntryProgress).toHaveBeenLastCalledWith(7, 2, null);
            expect(cancel).toHaveBeenCalledTimes(1);
        });
    });

    describe("autoSync", () => {
        it("pushes and flags the state when the episode is ahead", async () => {
            const { sync, platform, notifier } = setup();
            const state = { ...emptyPlaybackState(), episodeNumber: 5, mediaId: 101 };

            await sync.autoSync(localSession(5, 4), state);

            expect(platform.updateEntryProgress).toHaveBeenCalledWith(101, 5, 12);
            expect(state.progressUpdated).toBe(true);
            expect(notifier.sent).toEqual([
                {
                    kind: "playback-manager-progress-updated",
                    payload: { ...state, progressUpdated: true },
                },
            ]);
        });

        it("does nothing when the episode is already recorded", async () => {
            const { sync, platform, notifier } = setup();
            const state = emptyPlaybackState();

            await sync.autoSync(localSession(5, 5), state);

            expect(platform.updateEntryProgress).not.toHaveBeenCalled();
            expect(state.progressUpdated).toBe(false);
            expect(notifier.sent).toEqual([]);
        });

        it("does nothing when the preference is disabled", async () => {
            const { sync, platform, preferences, notifier } = setup();
            preferences.isAutoUpdateProgressEnabled.mockResolvedValueOnce(false);

            await sync.autoSync(localSession(5, 4), emptyPlaybackState());

            expect(platform.updateEntryProgress).not.toHaveBeenCalled();
            expect(notifier.sent).toEqual([]);
        });

        it("treats an unreadable preference as disabled", async () => {
            const { sync, platform, preferences, notifier } = setup();
            preferences.isAutoUpdateProgressEnabled.mockRejectedValueOnce(new Error("db locked"));

            await expect(
                sync.autoSync(localSession(5, 4), emptyPlaybackState())
            ).resolves.toBeUndefined();
            expect(platform.updateEntryProgress).not.toHaveBeenCalled();
            expect(notifier.sent).toEqual([]);
        });

        it("reports a failed push with a toast instead of throwing", async () => {
            const { sync, platform, notifier } = setup();
            platform.updateEntryProgress.mockRejectedValueOnce(new Error("HTTP 500"));
            const state = { ...emptyPlaybackState(), progressUpdated: true };

            await sync.autoSync(localSession(5, 4), state);

            expect(state.progressUpdated).toBe(false);
            expect(notifier.sent).toEqual([
                { kind: "error-toast", payload: AUTO_SYNC_FAILED_MESSAGE },
            ]);
        });

        it("pushes streams that have no list entry", async () => {
            const { sync, platform } = setup();
            const state = emptyPlaybackState();

            await sync.autoSync(streamSession(null), state);

            expect(platform.updateEntryProgress).toHaveBeenCalledWith(202, 4, null);
            expect(state.progressUpdated).toBe(true);
        });
    });
});
