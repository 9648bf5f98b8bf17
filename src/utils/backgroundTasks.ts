import PQueue from "p-queue";
import { yieldToEventLoop } from "./async";
import { createLogger, type Logger } from "./logger";

export interface BackgroundTaskOptions {
    /** Maximum tasks running at once (default 1, which keeps submission order). */
    concurrency?: number;
    /** Queue length above which a backlog warning is logged. */
    backlogWarnThreshold?: number;
    /** Milliseconds after which a task that has not settled is abandoned. */
    timeoutMs?: number;
    logger?: Logger;
}

export interface BackgroundTaskStats {
    pending: number;
    queued: number;
    completed: number;
    failures: number;
}

/**
 * Supervised queue for fire-and-forget work (presence pushes, queue
 * advancement, cache refreshes). Callers never await the task; failures and
 * timeouts are logged and counted instead of rejecting into the void.
 */
export class BackgroundTasks {
    private readonly queue: PQueue;
    private readonly backlogWarnThreshold: number;
    private readonly timeoutMs: number | undefined;
    private readonly log: Logger;
    private completed = 0;
    private failures = 0;
    private backlogWarned = false;

    constructor(name: string, options: BackgroundTaskOptions = {}) {
        this.timeoutMs = options.timeoutMs;
        // A timed-out task rejects the add() promise and frees its slot
        this.queue = new PQueue({
            concurrency: options.concurrency ?? 1,
            timeout: options.timeoutMs,
            throwOnTimeout: options.timeoutMs !== undefined,
        });
        this.backlogWarnThreshold = options.backlogWarnThreshold ?? 100;
        this.log = options.logger ?? createLogger(`background.${name}`);
    }

    run(label: string, task: () => unknown): void {
        if (this.queue.size >= this.backlogWarnThreshold) {
            if (!this.backlogWarned) {
                this.backlogWarned = true;
                this.log.warn(`Backlog of ${this.queue.size} tasks, latest: ${label}`);
            }
        } else {
            this.backlogWarned = false;
        }

        void this.queue
            .add(async () => {
                await yieldToEventLoop();
                try {
                    await task();
                    this.completed++;
                } catch (error) {
                    this.failures++;
                    this.log.warn(`Task "${label}" failed`, error);
                }
            })
            .catch((error: unknown) => {
                this.failures++;
                this.log.warn(`Task "${label}" timed out after ${this.timeoutMs}ms`, error);
            });
    }

    /** Resolves once every task submitted so far has settled. */
    async drain(): Promise<void> {
        await this.queue.onIdle();
    }

    stats(): BackgroundTaskStats {
        return {
            pending: this.queue.pending,
            queued: this.queue.size,
            completed: this.completed,
            failures: this.failures,
        };
    }
}
