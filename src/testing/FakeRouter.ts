import { Duplex, PassThrough } from 'stream';
import { Buffer } from 'buffer';
import { Auth } from '../core/Auth';
import { RosProtocol } from '../core/RosProtocol';
import { Sentence, SentenceCodec } from '../core/SentenceCodec';

/** A reply as the words of each sentence, terminators left out. */
export type ScriptedReply = string[][];

export type CommandHandler = (sentence: Sentence) => ScriptedReply | void;

/**
 * In-process stand-in for a RouterOS API endpoint.
 *
 * The client side gets `stream`; everything it writes is decoded into
 * sentences and handed to `handler`, whose reply is written back.
 */
export class FakeRouter {
    public readonly received: Sentence[] = [];

    private readonly toRouter = new PassThrough();
    private readonly fromRouter = new PassThrough();
    private receiveBuffer: Buffer = Buffer.alloc(0);
    private words: string[] = [];

    public readonly stream: Duplex = Duplex.from({ readable: this.fromRouter, writable: this.toRouter });

    constructor(private readonly handler: CommandHandler) {
        this.toRouter.on('data', (chunk: Buffer) => this.handleData(chunk));

        // The client destroying its end aborts both pipes
        this.toRouter.on('error', () => undefined);
        this.fromRouter.on('error', () => undefined);
    }

    /**
     * A router that runs the challenge login for `user`/`password`
     * and passes every other command to `handler`.
     */
    public static withLogin(
        user: string,
        password: string,
        handler: CommandHandler = () => [['!done']],
        seedHex: string = '0102'
    ): FakeRouter {
        return new FakeRouter((sentence) => {
            if (sentence.command !== '/login') return handler(sentence);

            if (Object.keys(sentence.attributes).length === 0) {
                return [['!done', `=ret=${seedHex}`]];
            }

            const expected = Auth.calculateLegacyMD5(password, seedHex);
            if (sentence.attributes['=name'] === user && sentence.attributes['=response'] === expected) {
                return [['!done']];
            }
            return [['!done', '=ret=error']];
        });
    }

    /** Writes sentences to the client, each followed by a terminator. */
    public send(reply: ScriptedReply): void {
        for (const words of reply) {
            for (const word of words) {
                this.fromRouter.write(RosProtocol.encodeWord(word));
            }
            this.fromRouter.write(RosProtocol.encodeWord(''));
        }
    }

    public sendRaw(bytes: Buffer): void {
        this.fromRouter.write(bytes);
    }

    /** Closes the router side of the connection. */
    public hangup(): void {
        this.fromRouter.end();
    }

    private handleData(chunk: Buffer): void {
        this.receiveBuffer = Buffer.concat([this.receiveBuffer, chunk]);

        for (;;) {
            const lengthInfo = RosProtocol.decodeLength(this.receiveBuffer);
            if (!lengthInfo) return;

            const end = lengthInfo.byteLength + lengthInfo.length;
            if (this.receiveBuffer.length < end) return;

            const word = this.receiveBuffer.subarray(lengthInfo.byteLength, end).toString('utf8');
            this.receiveBuffer = this.receiveBuffer.subarray(end);

            if (word.length > 0) {
                this.words.push(word);
                continue;
            }

            const sentence = SentenceCodec.fromWords(this.words);
            this.words = [];
            this.received.push(sentence);

            const reply = this.handler(sentence);
            if (reply) this.send(reply);
        }
    }
}
