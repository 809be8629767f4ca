import { EventEmitter } from 'events';
import { Auth } from '../core/Auth';
import { SocketClient, SocketClientOptions } from '../core/SocketClient';
import { ReplyMarker, Sentence, SentenceAttributes, SentenceCodec } from '../core/SentenceCodec';
import {
    RosAuthError,
    RosError,
    RosSessionError,
    RosTransportError,
    RosTrapError
} from '../core/RosError';
import { Logger, silentLogger } from '../utils/Logger';

export interface MikrotikOptions extends SocketClientOptions {
    /**
     * RouterOS username (default: 'admin')
     */
    user?: string;
    /**
     * RouterOS password (default: empty)
     */
    password?: string;
}

/**
 * Every sentence of one command's reply, in arrival order.
 * The last one is always `!done`.
 */
export type Reply = Sentence[];

type SessionState = 'new' | 'connecting' | 'ready' | 'busy' | 'closed';

export declare interface MikrotikClient {
    on(event: 'ready', listener: () => void): this;
    on(event: 'close', listener: () => void): this;
}

/**
 * MikrotikClient
 *
 * One authenticated RouterOS API session over a single connection.
 * Commands run strictly one at a time: each call writes one sentence and
 * collects the reply up to `!done` before the next may start.
 *
 * @example
 * const client = new MikrotikClient({ host: '192.168.88.1', user: 'admin', password: 'test-secret' });
 * await client.connect();
 * try {
 *     const reply = await client.runCommand('/interface/ovpn-client/print');
 *     // [{ command: '!re', attributes: { '=.id': '*1', ... } }, { command: '!done', attributes: {} }]
 * } finally {
 *     client.close();
 * }
 */
export class MikrotikClient extends EventEmitter {
    private readonly socket: SocketClient;
    private readonly logger: Logger;
    private readonly host: string;
    private readonly port: number;
    private readonly user: string;
    private readonly password: string;

    private state: SessionState = 'new';

    constructor(options: MikrotikOptions) {
        super();

        this.host = options.host;
        this.port = options.port ?? 8728;
        this.user = options.user ?? 'admin';
        this.password = options.password ?? '';
        this.logger = options.logger ?? silentLogger;

        this.socket = new SocketClient({
            host: this.host,
            port: this.port,
            timeout: options.timeout,
            keepAlive: options.keepAlive,
            stream: options.stream,
            logger: this.logger
        });

        this.socket.on('close', (error) => {
            this.logger.debug(`Connection lost: ${error.message}`);
            this.close();
        });
    }

    public get isConnected(): boolean {
        return (this.state === 'ready' || this.state === 'busy') && this.socket.connected;
    }

    /**
     * Opens the connection and logs in.
     * On any failure the connection is closed before the error propagates;
     * a rejected login surfaces as RosAuthError.
     */
    public async connect(): Promise<void> {
        if (this.state !== 'new') {
            throw new RosSessionError(`Cannot connect a session in state "${this.state}"`);
        }

        this.state = 'connecting';
        this.logger.debug(`Connecting to ${this.host}:${this.port}`);

        try {
            await this.socket.connect();
            await this.login();
        } catch (error) {
            this.close();
            throw error;
        }

        this.state = 'ready';
        this.emit('ready');
    }

    /**
     * Sends one command and waits for its complete reply.
     *
     * @param command The full command path (e.g. `/interface/ovpn-client/set`).
     * @param attributes Attribute words keyed by name including the sigil (e.g. `{ '=.id': '*1' }`).
     * @returns every non-empty sentence received, ending with `!done`.
     * @throws RosTrapError if the router answered with `!trap`. The error carries
     * the full reply and the session stays usable.
     * @throws RosTransportError or RosFramingError if the connection broke. The
     * session is closed.
     */
    public async runCommand(command: string, attributes: SentenceAttributes = {}): Promise<Reply> {
        if (this.state === 'busy') {
            throw new RosSessionError('Another command is still waiting for its reply', command);
        }
        if (this.state !== 'ready') {
            throw new RosSessionError(`Session is not ready (state: ${this.state}). Call connect() first.`, command);
        }

        return this.exchange(command, attributes);
    }

    /**
     * Closes the connection. Safe to call more than once.
     */
    public close(): void {
        if (this.state === 'closed') return;

        this.state = 'closed';
        this.socket.close();
        this.emit('close');
    }

    // ========================================================
    // PRIVATE HELPERS
    // ========================================================

    /**
     * Challenge login: `/login` returns a seed in `=ret`, answered with
     * `=name` and the MD5 `=response`. Routers that send no seed get the
     * plain-text `=name`/`=password` login instead.
     */
    private async login(): Promise<void> {
        try {
            this.logger.debug('Requesting login seed');
            const challenge = await this.exchange('/login', {});
            const seed = challenge[0]?.attributes['=ret'];

            let reply: Reply;
            if (seed === undefined) {
                this.logger.debug(`Logging in as ${this.user} (plain-text login)`);
                reply = await this.exchange('/login', { '=name': this.user, '=password': this.password });
            } else {
                this.logger.debug(`Logging in as ${this.user} with password ${Auth.mask(this.password)}`);
                reply = await this.exchange('/login', {
                    '=name': this.user,
                    '=response': Auth.calculateLegacyMD5(this.password, seed)
                });
            }

            if (reply[0]?.attributes['=ret'] === 'error') {
                throw new RosAuthError();
            }
        } catch (error) {
            if (error instanceof RosTrapError) {
                throw new RosAuthError(error.message);
            }
            throw error;
        }
    }

    /**
     * Raw exchange without the lifecycle checks. Used by login and runCommand.
     */
    private async exchange(command: string, attributes: SentenceAttributes): Promise<Reply> {
        const previous = this.state;
        this.state = 'busy';

        try {
            return await this.collectReply(command, attributes);
        } catch (error) {
            if (error instanceof RosError && error.isFatal) {
                this.close();
            }
            throw error;
        } finally {
            if (this.state === 'busy') this.state = previous;
        }
    }

    private async collectReply(command: string, attributes: SentenceAttributes): Promise<Reply> {
        this.logger.debug(`Running command: ${command}`);
        SentenceCodec.write(this.socket, { command, attributes });

        const reply: Reply = [];
        let trap: Sentence | null = null;

        for (;;) {
            const sentence = await SentenceCodec.read(this.socket);

            // A stray terminator carries nothing
            if (SentenceCodec.isEmpty(sentence)) continue;

            if (sentence.command === ReplyMarker.FATAL) {
                const reason = Object.entries(sentence.attributes)
                    .map(([name, value]) => (value === '' ? name : `${name}=${value}`))
                    .join(' ') || 'no reason given';
                throw new RosTransportError(`Router terminated the session: ${reason}`, command);
            }

            if (sentence.command === ReplyMarker.TRAP) trap = sentence;

            reply.push(sentence);

            if (sentence.command === ReplyMarker.DONE) break;
        }

        if (trap) {
            const message = trap.attributes['=message'] ?? 'Unknown RouterOS error';
            this.logger.debug(`Command ${command} trapped: ${message}`);
            throw new RosTrapError(message, command, reply);
        }

        return reply;
    }
}
