import { BackgroundTasks } from "../backgroundTasks";
import type { Logger } from "../logger";

function createTestLogger(): jest.Mocked<Logger> {
    const log: jest.Mocked<Logger> = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    log.child.mockReturnValue(log);
    return log;
}

describe("BackgroundTasks", () => {
    it("runs tasks after the caller returns, in submission order", async () => {
        const tasks = new BackgroundTasks("test", { logger: createTestLogger() });
        const order: string[] = [];

        tasks.run("first", () => {
            order.push("first");
        });
        tasks.run("second", async () => {
            order.push("second");
        });
        order.push("caller");
        await tasks.drain();

        expect(order).toEqual(["caller", "first", "second"]);
        expect(tasks.stats()).toEqual({ pending: 0, queued: 0, completed: 2, failures: 0 });
    });

    it("logs and counts failures without stopping the queue", async () => {
        const log = createTestLogger();
        const tasks = new BackgroundTasks("test", { logger: log });
        const error = new Error("presence offline");
        const after = jest.fn();

        tasks.run("presence.close", () => {
            throw error;
        });
        tasks.run("after", after);
        await tasks.drain();

        expect(log.warn).toHaveBeenCalledWith('Task "presence.close" failed', error);
        expect(after).toHaveBeenCalledTimes(1);
        expect(tasks.stats()).toEqual({ pending: 0, queued: 0, completed: 1, failures: 1 });
    });

    it("abandons a task that never settles and moves on", async () => {
        const log = createTestLogger();
        const tasks = new BackgroundTasks("test", { timeoutMs: 20, logger: log });
        const after = jest.fn();

        tasks.run("presence.set-activity", () => new Promise<void>(() => undefined));
        tasks.run("after", after);
        await tasks.drain();

        expect(after).toHaveBeenCalledTimes(1);
        expect(log.warn).toHaveBeenCalledWith(
            'Task "presence.set-activity" timed out after 20ms',
            expect.any(Error)
        );
        expect(tasks.stats()).toEqual({ pending: 0, queued: 0, completed: 1, failures: 1 });
    });

    it("warns once while the backlog stays above the threshold", async () => {
        const log = createTestLogger();
        const tasks = new BackgroundTasks("test", { backlogWarnThreshold: 1, logger: log });

        tasks.run("a", jest.fn());
        tasks.run("b", jest.fn());
        tasks.run("c", jest.fn());
        tasks.run("d", jest.fn());
        await tasks.drain();

        expect(log.warn).toHaveBeenCalledTimes(1);
        expect(log.warn).toHaveBeenCalledWith("Backlog of 1 tasks, latest: c");
    });
});
