export class TrackerError extends Error {
    constructor(message: string, public readonly status?: number, public cause?: unknown) {
        super(message);
        this.name = 'TrackerError';
    }
}
