/**
 * Returns a runner that starts each action only after the previous one settled,
 * in call order. A failed action rejects its own promise and does not block the queue.
 */
export function createExclusive() {
    let tail: Promise<unknown> = Promise.resolve();

    return <T>(action: () => Promise<T>): Promise<T> => {
        const result = tail.then(action);
        // the caller observes the failure through `result`
        tail = result.then(noop, noop);
        return result;
    };
}

function noop() {
}
