import { randomUUID } from 'node:crypto';
import { Inject, Service } from 'typedi';
import { AppConfig, AppConfigToken } from '../../config';
import { Session } from '../../types/chat';
import { Clock, ClockToken } from '../../utils/clock';
import { createLogger } from '../../utils/logger';

const logger = createLogger('SESSION_REGISTRY');

export interface ResolvedSession {
    session: Session;
    isNew: boolean;
}

/**
 * Process-wide map of live sessions. Created with the container, swept on an
 * interval while started, emptied when the process exits.
 */
@Service()
export class SessionRegistry {
    private readonly sessions = new Map<string, Session>();

    /** Session created in answer to an id the registry did not know, keyed by that id. */
    private readonly createdFor = new Map<string, Session>();
    private readonly requestedIds = new Map<string, string>();

    private sweepTimer?: NodeJS.Timeout;

    constructor(
        @Inject(AppConfigToken) private readonly config: AppConfig,
        @Inject(ClockToken) private readonly clock: Clock,
    ) {}

    get size(): number {
        return this.sessions.size;
    }

    /**
     * Returns the live session for the id, or creates one under a fresh id.
     * Every caller that sends the same unknown id gets the session created for
     * the first of them.
     */
    resolve(sessionId?: string | null): ResolvedSession {
        const now = this.clock();
        if (sessionId) {
            const existing = this.sessions.get(sessionId) ?? this.createdFor.get(sessionId);
            if (existing && !this.isIdle(existing, now)) {
                existing.lastActiveAt = now;
                return { session: existing, isNew: false };
            }
            if (existing) {
                this.remove(existing);
                logger.info('Evicted idle session on access', { sessionId: existing.id });
            }
        }

        const session: Session = { id: this.generateId(), createdAt: now, lastActiveAt: now };
        this.sessions.set(session.id, session);
        if (sessionId) {
            this.createdFor.set(sessionId, session);
            this.requestedIds.set(session.id, sessionId);
        }
        logger.info('Created session', { sessionId: session.id, requestedId: sessionId ?? null });
        return { session, isNew: true };
    }

    /** Looks a session up without counting it as activity. */
    get(sessionId: string): Session | undefined {
        const session = this.sessions.get(sessionId);
        if (!session || this.isIdle(session, this.clock())) {
            return undefined;
        }
        return session;
    }

    delete(sessionId: string): boolean {
        const session = this.sessions.get(sessionId);
        if (!session) {
            return false;
        }
        this.remove(session);
        logger.info('Deleted session', { sessionId });
        return true;
    }

    sweep(): string[] {
        const now = this.clock();
        const evicted: string[] = [];
        for (const session of [...this.sessions.values()]) {
            if (this.isIdle(session, now)) {
                this.remove(session);
                evicted.push(session.id);
            }
        }
        if (evicted.length > 0) {
            logger.info(`Evicted ${evicted.length} idle session(s)`, { remaining: this.sessions.size });
        }
        return evicted;
    }

    start(): void {
        if (this.sweepTimer) {
            return;
        }
        this.sweepTimer = setInterval(() => this.sweep(), this.config.sessions.sweepIntervalMs);
        this.sweepTimer.unref();
    }

    stop(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = undefined;
        }
    }

    private remove(session: Session): void {
        this.sessions.delete(session.id);
        const requestedId = this.requestedIds.get(session.id);
        if (requestedId !== undefined) {
            this.requestedIds.delete(session.id);
            this.createdFor.delete(requestedId);
        }
    }

    private isIdle(session: Session, now: Date): boolean {
        return now.getTime() - session.lastActiveAt.getTime() > this.config.sessions.idleTimeoutMs;
    }

    private generateId(): string {
        let id = randomUUID();
        while (this.sessions.has(id)) {
            id = randomUUID();
        }
        return id;
    }
}
