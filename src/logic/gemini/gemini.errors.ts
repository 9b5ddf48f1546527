export class GenerationCallError extends Error {
    constructor(message: string, readonly rateLimited: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationCallError';
    }
}

/** Safety rejection reported by the model; not a system failure. */
export class GenerationBlockedError extends Error {
    constructor(readonly reason: string) {
        super(`Generation blocked: ${reason}`);
        this.name = 'GenerationBlockedError';
    }
}
