import { randomUUID } from "crypto";
import PQueue from "p-queue";
import { yieldToEventLoop } from "../../utils/async";
import { EventMailbox } from "../../utils/eventMailbox";
import { createLogger, type Logger } from "../../utils/logger";
import type { PlaybackSubscriberEvent } from "./types";

const DEFAULT_MAILBOX_SIZE = 256;

export class PlaybackStatusSubscriber implements AsyncIterable<PlaybackSubscriberEvent> {
    readonly mailbox: EventMailbox<PlaybackSubscriberEvent>;
    private canceledFlag = false;

    constructor(readonly id: string, mailboxSize: number) {
        this.mailbox = new EventMailbox(mailboxSize);
    }

    get canceled(): boolean {
        return this.canceledFlag;
    }

    /** Marks the subscriber canceled; the registry evicts it on compaction. */
    cancel(): void {
        this.canceledFlag = true;
        this.mailbox.close();
    }

    next(): Promise<IteratorResult<PlaybackSubscriberEvent, undefined>> {
        return this.mailbox.next();
    }

    [Symbol.asyncIterator](): AsyncIterator<PlaybackSubscriberEvent, undefined> {
        return this.mailbox[Symbol.asyncIterator]();
    }
}

export interface PlaybackSubscriberRegistryOptions {
    mailboxSize?: number;
    logger?: Logger;
}

/**
 * Fan-out of playback events to subscribers.
 *
 * `broadcast` only enqueues: delivery runs on a single fan-out queue, so the
 * caller never waits on subscribers and every subscriber sees the events of
 * one broadcast, and of successive broadcasts, in generation order.
 */
export class PlaybackSubscriberRegistry {
    private subscribers = new Map<string, PlaybackStatusSubscriber>();
    private readonly fanout = new PQueue({ concurrency: 1 });
    private readonly mailboxSize: number;
    private readonly log: Logger;

    constructor(options: PlaybackSubscriberRegistryOptions = {}) {
        this.mailboxSize = options.mailboxSize ?? DEFAULT_MAILBOX_SIZE;
        this.log = options.logger ?? createLogger("playback-manager.subscribers");
    }

    subscribe(id: string = randomUUID()): PlaybackStatusSubscriber {
        this.compact();

        const existing = this.subscribers.get(id);
        if (existing) {
            existing.cancel();
        }

        const subscriber = new PlaybackStatusSubscriber(id, this.mailboxSize);
        this.subscribers.set(id, subscriber);
        return subscriber;
    }

    unsubscribe(id: string): void {
        this.subscribers.get(id)?.cancel();
    }

    broadcast(...events: PlaybackSubscriberEvent[]): void {
        if (events.length === 0) {
            return;
        }

        void this.fanout.add(async () => {
            await yieldToEventLoop();
            this.deliver(events);
        });
    }

    /** Evicts canceled subscribers; returns how many were removed. */
    compact(): number {
        let removed = 0;
        for (const [id, subscriber] of this.subscribers) {
            if (subscriber.canceled) {
                this.subscribers.delete(id);
                removed++;
            }
        }
        return removed;
    }

    /** Resolves once every broadcast issued so far has been delivered. */
    async drain(): Promise<void> {
        await this.fanout.onIdle();
    }

    get activeCount(): number {
        let count = 0;
        for (const subscriber of this.subscribers.values()) {
            if (!subscriber.canceled) count++;
        }
        return count;
    }

    private deliver(events: PlaybackSubscriberEvent[]): void {
        for (const subscriber of this.subscribers.values()) {
            try {
                const droppedBefore = subscriber.mailbox.dropped;
                for (const event of events) {
                    if (subscriber.canceled) break;
                    subscriber.mailbox.push(event);
                }

                const dropped = subscriber.mailbox.dropped - droppedBefore;
                if (dropped > 0) {
                    this.log.warn(
                        `Subscriber ${subscriber.id} is not keeping up, dropped ${dropped} event(s)`
                    );
                }
            } catch (error) {
                this.log.warn(`Delivery to subscriber ${subscriber.id} failed`, error);
            }
        }
    }
}
