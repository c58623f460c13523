let contextCounter = 0

// Context ids only need to be unique within the process.
export function createContextId(): string {
    contextCounter += 1
    return `wc_${contextCounter.toString(36)}`
}
