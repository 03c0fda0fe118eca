import { Inject, Service } from 'typedi';
import { Session, Turn, TurnRole } from '../../types/chat';
import { Clock, ClockToken } from '../../utils/clock';

/**
 * Ordered, append-only history of each session.
 *
 * Turns are kept in a WeakMap keyed by the Session object, so dropping a
 * session from the registry releases its history with it. Every method is
 * synchronous: a caller that snapshots and appends without awaiting in
 * between cannot be interleaved with another request on the same session.
 */
@Service()
export class TranscriptStore {
    private readonly transcripts = new WeakMap<Session, Turn[]>();

    constructor(@Inject(ClockToken) private readonly clock: Clock) {}

    append(session: Session, role: TurnRole, text: string): Turn {
        const turn: Turn = Object.freeze({ role, text, timestamp: this.clock() });
        const turns = this.transcripts.get(session);
        if (turns) {
            turns.push(turn);
        } else {
            this.transcripts.set(session, [turn]);
        }
        return turn;
    }

    snapshot(session: Session): readonly Turn[] {
        const turns = this.transcripts.get(session);
        return Object.freeze(turns ? turns.slice() : []);
    }
}
