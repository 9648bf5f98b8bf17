/**
 * Yield to the event loop so queued work runs after the current handler
 * has returned control.
 */
export function yieldToEventLoop(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
