import * as net from 'net';
import { Duplex } from 'stream';
import { EventEmitter } from 'events';
import { Buffer } from 'buffer';
import { DecodedLength, RosProtocol } from './RosProtocol';
import { RosError, RosFramingError, RosTransportError } from './RosError';
import type { WordTransport } from './SentenceCodec';
import { Auth } from './Auth';
import { Logger, silentLogger } from '../utils/Logger';

/**
 * Configuration options for the Socket Client.
 */
export interface SocketClientOptions {
    /** Target IP address or Hostname */
    host: string;
    /** Target Port (default: 8728) */
    port?: number;
    /** Dial timeout in seconds (default: 10). Reads never time out. */
    timeout?: number;
    /** Enable TCP Keep-Alive to prevent idle disconnects (default: true) */
    keepAlive?: boolean;
    /**
     * An already-dialed byte stream to use instead of opening a TCP connection.
     * The client takes ownership and destroys it on close.
     */
    stream?: Duplex;
    logger?: Logger;
}

export declare interface SocketClient {
    /** The stream failed or the peer closed it. Not emitted for close(). */
    on(event: 'close', listener: (error: RosError) => void): this;
}

interface PendingRead {
    resolve: (word: string) => void;
    reject: (error: RosError) => void;
}

/**
 * Low-level word stream over one duplex connection.
 * Responsibilities:
 * 1. Transport Layer: dials plain TCP, or adopts a stream handed in by the caller.
 * 2. Event Handling: turns socket errors and closures into RosErrors.
 * 3. Framing: buffers incoming raw bytes and cuts them into RouterOS words,
 *    handed out one at a time by readWord().
 */
export class SocketClient extends EventEmitter implements WordTransport {
    private socket: Duplex | null = null;
    private readonly host: string;
    private readonly port: number;
    private readonly timeout: number;
    private readonly keepAlive: boolean;
    private readonly stream: Duplex | undefined;
    private readonly logger: Logger;

    // State tracking
    public connected: boolean = false;
    private isManuallyClosing: boolean = false;

    // Buffer accumulator for handling TCP packet fragmentation
    private receiveBuffer: Buffer = Buffer.alloc(0);

    // Complete words not yet consumed by readWord()
    private readonly words: string[] = [];
    private pendingRead: PendingRead | null = null;

    // Set once the stream is unusable; every later read fails with it
    private failure: RosError | null = null;

    constructor(options: SocketClientOptions) {
        super();
        this.host = options.host;
        this.port = options.port ?? 8728;
        this.timeout = options.timeout ?? 10;
        this.keepAlive = options.keepAlive ?? true;
        this.stream = options.stream;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Establishes the connection to the router.
     * @returns Promise that resolves when the stream is ready for words.
     */
    public connect(): Promise<void> {
        if (this.connected) return Promise.resolve();

        if (this.stream) {
            this.attach(this.stream);
            return Promise.resolve();
        }

        return new Promise((resolve, reject) => {
            const { host, port } = this;
            const timeoutMs = this.timeout * 1000;

            this.logger.debug(`Dialing ${host}:${port}`);

            const socket = new net.Socket();
            socket.setTimeout(timeoutMs);

            const onTimeout = () => {
                socket.destroy();
                reject(new RosTransportError(`Connection timed out after ${this.timeout} seconds`));
            };
            const onError = (err: Error) => {
                reject(new RosTransportError(`Could not connect to ${host}:${port}: ${err.message}`));
            };

            socket.once('timeout', onTimeout);
            socket.once('error', onError);

            socket.once('connect', () => {
                socket.removeListener('timeout', onTimeout);
                socket.removeListener('error', onError);

                // Clear the dial timeout; a slow router must not be cut off mid-reply
                socket.setTimeout(0);
                socket.setNoDelay(true);
                if (this.keepAlive) {
                    socket.setKeepAlive(true, 10000);
                }

                this.attach(socket);
                resolve();
            });

            socket.connect(port, host);
        });
    }

    /**
     * Writes one word (length prefix + bytes).
     */
    public writeWord(word: string): void {
        if (!this.connected || !this.socket) {
            throw this.failure ?? new RosTransportError('Socket is not connected. Call connect() first.');
        }

        this.logger.trace(`>>> ${Auth.maskWord(word)}`);
        this.socket.write(RosProtocol.encodeWord(word));
    }

    /**
     * Resolves with the next complete word; "" is the sentence terminator.
     * Only one read may be outstanding at a time.
     */
    public readWord(): Promise<string> {
        const word = this.words.shift();
        if (word !== undefined) return Promise.resolve(word);

        if (this.failure) return Promise.reject(this.failure);
        if (!this.socket) {
            return Promise.reject(new RosTransportError('Socket is not connected. Call connect() first.'));
        }
        if (this.pendingRead) {
            return Promise.reject(new RosTransportError('A read is already in progress on this socket.'));
        }

        return new Promise((resolve, reject) => {
            this.pendingRead = { resolve, reject };
        });
    }

    /**
     * Gracefully closes the connection.
     */
    public close(): void {
        if (!this.socket) return;

        this.isManuallyClosing = true;
        this.fail(new RosTransportError('Connection closed'));
        this.socket.destroy();
        this.socket = null;
    }

    private attach(socket: Duplex): void {
        this.socket = socket;
        this.connected = true;
        this.isManuallyClosing = false;

        socket.on('data', (chunk: Buffer | string) => {
            const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, 'utf8');
            this.handleDataChunk(bufferChunk);
        });

        socket.on('error', (err: Error) => {
            this.fail(new RosTransportError(`Socket error: ${err.message}`));
        });

        socket.on('end', () => this.handlePeerClosed());

        socket.on('close', () => this.handlePeerClosed());
    }

    private handlePeerClosed(): void {
        if (this.isManuallyClosing) return;

        if (this.receiveBuffer.length > 0) {
            this.fail(new RosFramingError(
                `Connection closed with ${this.receiveBuffer.length} bytes of an incomplete word pending`
            ));
        } else {
            this.fail(new RosTransportError('Connection closed by peer'));
        }
    }

    /**
     * Marks the stream unusable. The first failure wins.
     */
    private fail(error: RosError): void {
        this.connected = false;
        const first = this.failure === null;
        if (!this.failure) this.failure = error;

        const pending = this.pendingRead;
        this.pendingRead = null;
        pending?.reject(this.failure);

        if (first && !this.isManuallyClosing) this.emit('close', this.failure);
    }

    /**
     * Extracts complete words from the accumulated bytes.
     */
    private handleDataChunk(chunk: Buffer): void {
        if (this.failure) return;

        this.receiveBuffer = Buffer.concat([this.receiveBuffer, chunk]);

        while (this.receiveBuffer.length > 0) {
            let lengthInfo: DecodedLength | null;
            try {
                lengthInfo = RosProtocol.decodeLength(this.receiveBuffer);
            } catch (err) {
                if (!(err instanceof RosFramingError)) throw err;
                this.fail(err);
                this.socket?.destroy();
                return;
            }

            // Not enough bytes for the length header, wait for next packet
            if (!lengthInfo) break;

            const { length, byteLength } = lengthInfo;
            const totalPacketSize = byteLength + length;

            // Header is here but not the full body, wait
            if (this.receiveBuffer.length < totalPacketSize) break;

            const word = this.receiveBuffer.subarray(byteLength, totalPacketSize).toString('utf8');
            this.receiveBuffer = this.receiveBuffer.subarray(totalPacketSize);

            this.logger.trace(`<<< ${word}`);
            this.deliver(word);
        }
    }

    private deliver(word: string): void {
        const pending = this.pendingRead;
        if (pending) {
            this.pendingRead = null;
            pending.resolve(word);
        } else {
            this.words.push(word);
        }
    }
}
