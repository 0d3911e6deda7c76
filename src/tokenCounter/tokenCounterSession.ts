import { logger } from '../logger';

/**
 * Counts the tokens of a document's text. Implementations should stop early and
 * reject once `signal` is aborted.
 */
export interface TokenCountBackend {
    count(text: string, signal: AbortSignal): Promise<number>;
}

export interface TokenCounterSettings {
    /** Quiet period after the last change before a count starts. */
    debounceMs: number;
    /** Status text once a count is known; `%d` is replaced with the count. */
    format: string;
    /** Status text while no count is known yet. */
    countingFormat: string;
}

export type TokenCountListener = (count: number) => void;

/**
 * Token count state for one open document.
 *
 * At most one count is pending at a time: scheduling a new one cancels the debounce
 * timer and aborts the in-flight request, and results of superseded requests are dropped.
 */
export class TokenCounterSession {
    private lastCount: number | null = null;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private inFlight: AbortController | null = null;
    private disposed = false;

    constructor(
        readonly documentId: string,
        private readonly backend: TokenCountBackend,
        private readonly settings: TokenCounterSettings,
        private readonly onCount?: TokenCountListener
    ) {}

    get count(): number | null {
        return this.lastCount;
    }

    get isPending(): boolean {
        return this.timer !== null || this.inFlight !== null;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    /**
     * Counts `text` once the document has been quiet for `debounceMs`.
     */
    schedule(text: string): void {
        if (this.disposed) {
            return;
        }

        this.clearTimer();
        this.inFlight?.abort();
        this.timer = setTimeout(() => {
            this.timer = null;
            void this.countNow(text);
        }, this.settings.debounceMs);
    }

    /**
     * Counts `text` immediately. Resolves to the new count, or null when the request was
     * superseded, cancelled or failed. Never rejects.
     */
    async countNow(text: string): Promise<number | null> {
        if (this.disposed) {
            return null;
        }

        this.inFlight?.abort();
        const controller = new AbortController();
        this.inFlight = controller;

        try {
            const count = await this.backend.count(text, controller.signal);
            if (controller.signal.aborted) {
                return null;
            }
            this.lastCount = count;
            this.onCount?.(count);
            return count;
        } catch (error) {
            if (!controller.signal.aborted) {
                logger.warn(`Token count failed for ${this.documentId}:`, error);
            }
            return null;
        } finally {
            if (this.inFlight === controller) {
                this.inFlight = null;
            }
        }
    }

    statusText(): string {
        if (this.lastCount === null) {
            return this.settings.countingFormat;
        }
        return this.settings.format.replace('%d', String(this.lastCount));
    }

    dispose(): void {
        this.disposed = true;
        this.clearTimer();
        this.inFlight?.abort();
        this.inFlight = null;
    }

    private clearTimer(): void {
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
