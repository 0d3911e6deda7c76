import {
    TokenCounterSession,
    type TokenCountBackend,
    type TokenCounterSettings,
    type TokenCountListener,
} from './tokenCounterSession';

export interface TokenCounterRegistrySettings extends TokenCounterSettings {
    /** Start counting automatically for documents passed to `openDocument()`. */
    enabled: boolean;
}

/**
 * Token counter sessions keyed by document id.
 */
export class TokenCounterRegistry {
    private readonly sessions = new Map<string, TokenCounterSession>();

    constructor(
        private readonly backend: TokenCountBackend,
        private readonly settings: TokenCounterRegistrySettings
    ) {}

    /**
     * Starts a session and counts `text` right away. An existing session is kept.
     */
    enable(documentId: string, text: string, onCount?: TokenCountListener): TokenCounterSession {
        const existing = this.sessions.get(documentId);
        if (existing) {
            return existing;
        }

        const session = new TokenCounterSession(documentId, this.backend, this.settings, onCount);
        this.sessions.set(documentId, session);
        void session.countNow(text);
        return session;
    }

    /**
     * Enables counting for a newly opened document when counting is on by default.
     */
    openDocument(documentId: string, text: string, onCount?: TokenCountListener): TokenCounterSession | null {
        return this.settings.enabled ? this.enable(documentId, text, onCount) : null;
    }

    disable(documentId: string): void {
        const session = this.sessions.get(documentId);
        if (!session) {
            return;
        }
        session.dispose();
        this.sessions.delete(documentId);
    }

    /**
     * Returns whether counting is enabled for the document afterwards.
     */
    toggle(documentId: string, text: string, onCount?: TokenCountListener): boolean {
        if (this.sessions.has(documentId)) {
            this.disable(documentId);
            return false;
        }
        this.enable(documentId, text, onCount);
        return true;
    }

    /**
     * Document change notification; schedules a debounced recount for enabled documents.
     */
    update(documentId: string, text: string): void {
        this.sessions.get(documentId)?.schedule(text);
    }

    isEnabled(documentId: string): boolean {
        return this.sessions.has(documentId);
    }

    get(documentId: string): TokenCounterSession | undefined {
        return this.sessions.get(documentId);
    }

    getCount(documentId: string): number | null {
        return this.sessions.get(documentId)?.count ?? null;
    }

    /**
     * Status text for the document, or '' when counting is not enabled for it.
     */
    statusText(documentId: string): string {
        return this.sessions.get(documentId)?.statusText() ?? '';
    }

    get size(): number {
        return this.sessions.size;
    }

    disposeAll(): void {
        for (const session of this.sessions.values()) {
            session.dispose();
        }
        this.sessions.clear();
    }
}
