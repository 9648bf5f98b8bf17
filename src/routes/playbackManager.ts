import { Router } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import type { PlaybackManager } from "../services/playbackManager/playbackManager";
import {
    parseMediaPlayerEvent,
    type PushMediaPlayerEventSource,
} from "../services/playbackManager/mediaPlayerEvents";

const manualTrackingSchema = z.object({
    mediaId: z.number().int().positive(),
    episodeNumber: z.number().int().min(0),
    totalEpisodes: z.number().int().min(-1).default(-1),
});

/**
 * Routes for the playback manager, mounted under /api/playback-manager.
 * `eventSource` is only needed for players that report over HTTP.
 */
export function createPlaybackManagerRouter(
    manager: PlaybackManager,
    eventSource?: PushMediaPlayerEventSource
): Router {
    const router = Router();

    // GET /state
    router.get("/state", (_req, res) => {
        res.json({
            playbackType: manager.getPlaybackType(),
            state: manager.getCurrentPlaybackState(),
        });
    });

    // GET /next-episode
    router.get("/next-episode", (_req, res) => {
        res.json({ nextEpisode: manager.getNextEpisode() });
    });

    // POST /sync-progress
    router.post("/sync-progress", async (_req, res, next) => {
        try {
            const state = await manager.syncCurrentProgress();
            res.json({ state });
        } catch (error) {
            next(error);
        }
    });

    // POST /manual-tracking
    router.post("/manual-tracking", async (req, res, next) => {
        try {
            const data = manualTrackingSchema.parse(req.body);
            await manager.startManualTracking(data);
            res.status(201).json({ playbackType: manager.getPlaybackType() });
        } catch (error) {
            if (error instanceof z.ZodError) {
                res.status(400).json({ error: "Invalid request", details: error.errors });
                return;
            }
            next(error);
        }
    });

    // DELETE /manual-tracking
    router.delete("/manual-tracking", async (_req, res, next) => {
        try {
            const canceled = await manager.cancelManualTracking();
            res.json({ canceled });
        } catch (error) {
            next(error);
        }
    });

    // POST /player-events
    router.post("/player-events", (req, res, next) => {
        if (!eventSource) {
            res.status(404).json({ error: "HTTP player events are not enabled" });
            return;
        }

        try {
            const event = parseMediaPlayerEvent(req.body);
            const delivered = eventSource.publish(event);
            if (delivered === 0) {
                logger.warn(`[PlaybackManager] No listener for ${event.type} event`);
            }
            res.status(202).json({ accepted: true, delivered });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
