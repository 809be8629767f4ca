/**
 * core/RosError.ts
 *
 * Error hierarchy for RouterOS API sessions.
 * Features:
 * - One subclass per failure kind (transport, framing, auth, trap, session misuse).
 * - Semantic getters (isFatal, isAuthError, isTrap).
 * - JSON serialization support.
 */
import type { Sentence } from './SentenceCodec';

export type RosErrorKind = 'transport' | 'framing' | 'auth' | 'trap' | 'session';

export class RosError extends Error {
    public readonly isRosError = true;
    public readonly timestamp: Date;

    constructor(
        public readonly kind: RosErrorKind,
        message: string,
        public readonly command?: string
    ) {
        super(message);

        this.name = 'RosError';
        this.timestamp = new Date();

        // Fix for extending built-ins in TypeScript/ES6
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * True when the session can no longer be used.
     * Only a trap leaves the connection in a known state.
     */
    get isFatal(): boolean {
        return this.kind !== 'trap' && this.kind !== 'session';
    }

    get isAuthError(): boolean {
        return this.kind === 'auth';
    }

    get isTrap(): boolean {
        return this.kind === 'trap';
    }

    /**
     * Custom generic JSON representation for logging systems.
     */
    public toJSON() {
        return {
            errorType: this.name,
            kind: this.kind,
            message: this.message,
            command: this.command,
            isFatal: this.isFatal,
            timestamp: this.timestamp
        };
    }
}

/** Dial, read or write failure, or the peer dropping the connection. */
export class RosTransportError extends RosError {
    constructor(message: string, command?: string) {
        super('transport', message, command);
        this.name = 'RosTransportError';
    }
}

/** Malformed length prefix or a word cut short. The stream is out of sync. */
export class RosFramingError extends RosError {
    constructor(message: string) {
        super('framing', message);
        this.name = 'RosFramingError';
    }
}

export class RosAuthError extends RosError {
    constructor(message: string = 'Access denied') {
        super('auth', message, '/login');
        this.name = 'RosAuthError';
    }
}

/**
 * The router answered a command with `!trap`.
 * `reply` holds every sentence of the exchange, the trap and `!done` included.
 */
export class RosTrapError extends RosError {
    constructor(
        message: string,
        command: string,
        public readonly reply: Sentence[]
    ) {
        super('trap', message, command);
        this.name = 'RosTrapError';
    }

    public toJSON() {
        return { ...super.toJSON(), reply: this.reply };
    }
}

/** The session was used out of order (not connected, closed, or already busy). */
export class RosSessionError extends RosError {
    constructor(message: string, command?: string) {
        super('session', message, command);
        this.name = 'RosSessionError';
    }
}
