import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import type { MediaPlayerEventSource, MediaPlayerSubscription } from "./collaborators";
import { EventMailbox } from "../../utils/eventMailbox";
import type { MediaPlayerEvent } from "./types";

const statusSchema = z.object({
    filename: z.string(),
    filepath: z.string().default(""),
    currentTimeInSeconds: z.number().min(0),
    durationInSeconds: z.number().min(0),
    completionPercentage: z.number().min(0),
    playing: z.boolean(),
});

const withStatus = <T extends string>(type: T) =>
    z.object({ type: z.literal(type), status: statusSchema });

const withReason = <T extends string>(type: T) =>
    z.object({ type: z.literal(type), reason: z.string().default("") });

const mediaPlayerEventSchema = z.discriminatedUnion("type", [
    withStatus("tracking-started"),
    withStatus("playback-status"),
    withStatus("video-completed"),
    withReason("tracking-stopped"),
    withReason("tracking-retry"),
    withStatus("streaming-tracking-started"),
    withStatus("streaming-playback-status"),
    withStatus("streaming-video-completed"),
    withReason("streaming-tracking-stopped"),
    withReason("streaming-tracking-retry"),
]);

/** Validates a player event received as JSON from an out-of-process player. */
export function parseMediaPlayerEvent(raw: unknown): MediaPlayerEvent {
    const parsed = mediaPlayerEventSchema.safeParse(raw);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.INVALID_PLAYER_EVENT,
            ErrorCategory.RECOVERABLE,
            "Invalid media player event",
            {
                issues: parsed.error.errors.map(
                    (issue) => `${issue.path.join(".") || "event"}: ${issue.message}`
                ),
            }
        );
    }
    return parsed.data;
}

/**
 * Event source fed by `publish`, for players that report over HTTP.
 * Every subscription gets its own mailbox; `cancel` is forwarded to the
 * player's stop hook.
 */
export class PushMediaPlayerEventSource implements MediaPlayerEventSource {
    private mailboxes = new Set<EventMailbox<MediaPlayerEvent>>();

    constructor(private readonly onCancel: () => void = () => undefined) {}

    publish(event: MediaPlayerEvent): number {
        let delivered = 0;
        for (const mailbox of this.mailboxes) {
            if (mailbox.push(event)) delivered++;
        }
        return delivered;
    }

    subscribe(): MediaPlayerSubscription {
        const mailbox = new EventMailbox<MediaPlayerEvent>();
        this.mailboxes.add(mailbox);
        return {
            events: mailbox,
            close: () => {
                mailbox.close();
                this.mailboxes.delete(mailbox);
            },
        };
    }

    cancel(): void {
        this.onCancel();
    }

    get subscriberCount(): number {
        return this.mailboxes.size;
    }
}
