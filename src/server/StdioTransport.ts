/**
 * StdioTransport — MCP Transport over a Stream Pair
 *
 * An SDK {@link Transport} for newline-delimited JSON-RPC on a readable
 * and a writable stream; `process.stdin` / `process.stdout` by default.
 * Framing and decoding use the SDK's `ReadBuffer`; this class adds a
 * frame-size limit, reports why the input ended, and keeps the output
 * usable while the dispatcher drains.
 *
 * The input side ends on end-of-input, on a read error, when the input
 * closes early, when the output fails, or when a line outgrows the frame
 * limit. Frames that do not decode reach `onerror` as a
 * {@link MalformedFrameError}; reading continues.
 *
 * @module
 */
import { type Readable, type Writable } from 'node:stream';
import { ReadBuffer, serializeMessage } from '@modelcontextprotocol/sdk/shared/stdio.js';
import { type Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import {
    type OutgoingMessage,
    FrameOverflowError,
    isUncorrelated,
    malformedFrame,
} from './protocol.js';

// ============================================================================
// Transport Contract
// ============================================================================

/** Why the input side stopped producing messages. */
export type InputEndReason = 'end' | 'error' | 'overflow';

/**
 * The SDK transport contract plus an input-end signal, so the dispatcher
 * can drain in-flight calls before closing. `send` also takes an
 * {@link UncorrelatedError}.
 */
export interface ServerTransport extends Transport {
    /** Input is exhausted; no further `onmessage` calls follow */
    oninputend?: (reason: InputEndReason, error?: Error) => void;
    send(message: OutgoingMessage): Promise<void>;
}

export interface StdioTransportOptions {
    readonly input?: Readable;
    readonly output?: Writable;
    /** Longest unterminated line accepted, in bytes */
    readonly maxFrameBytes: number;
}

const NEWLINE = 0x0a;

// ============================================================================
// StdioTransport
// ============================================================================

export class StdioTransport implements ServerTransport {
    onmessage?: Transport['onmessage'];
    onerror?: (error: Error) => void;
    onclose?: () => void;
    oninputend?: (reason: InputEndReason, error?: Error) => void;

    private readonly _input: Readable;
    private readonly _output: Writable;
    private readonly _maxFrameBytes: number;
    private readonly _readBuffer = new ReadBuffer();
    /** Bytes buffered after the last newline */
    private _pendingBytes = 0;
    private _started = false;
    private _inputEnded = false;
    private _outputFailed = false;
    private _closed = false;

    constructor(options: StdioTransportOptions) {
        this._input = options.input ?? process.stdin;
        this._output = options.output ?? process.stdout;
        this._maxFrameBytes = options.maxFrameBytes;
    }

    async start(): Promise<void> {
        if (this._started) {
            throw new Error('StdioTransport already started');
        }
        this._started = true;
        this._input.on('data', this._onData);
        this._input.on('end', this._onEnd);
        this._input.on('error', this._onInputError);
        this._input.on('close', this._onInputClose);
        this._output.on('error', this._onOutputError);
        this._output.on('close', this._onOutputClose);
    }

    get writable(): boolean {
        return !this._outputFailed
            && this._output.writable
            && !this._output.writableEnded
            && !this._output.destroyed;
    }

    /**
     * Write one message with a single write call. Settles once the output
     * accepted it, waiting for `drain` when the stream is over its
     * high-water mark.
     *
     * @throws {Error} When the output is no longer writable
     */
    async send(message: OutgoingMessage): Promise<void> {
        if (!this.writable) {
            throw new Error('Output not writable');
        }
        const frame = isUncorrelated(message) ? `${JSON.stringify(message)}\n` : serializeMessage(message);
        if (this._output.write(frame)) return;
        await this._waitForDrain();
    }

    /** Stop reading. Output error listeners stay attached so late failures are reported. */
    async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;
        this._stopInput();
        this.onclose?.();
    }

    // ── Input ────────────────────────────────────────────

    private readonly _onData = (chunk: Buffer | string): void => {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
        const lastNewline = bytes.lastIndexOf(NEWLINE);
        const pending = lastNewline === -1
            ? this._pendingBytes + bytes.length
            : bytes.length - lastNewline - 1;

        if (pending > this._maxFrameBytes) {
            // Lines completed before the overflow are still dispatched.
            if (lastNewline !== -1) this._readBuffer.append(bytes.subarray(0, lastNewline + 1));
            this._readMessages();
            this._endInput('overflow', new FrameOverflowError(this._maxFrameBytes));
            return;
        }

        this._pendingBytes = pending;
        this._readBuffer.append(bytes);
        this._readMessages();
    };

    private readonly _onEnd = (): void => {
        // An unterminated last line is still a frame.
        if (this._pendingBytes > 0) this._readBuffer.append(Buffer.from('\n'));
        this._pendingBytes = 0;
        this._readMessages();
        this._endInput('end');
    };

    private readonly _onInputError = (err: Error): void => {
        this._endInput('error', err);
    };

    private readonly _onInputClose = (): void => {
        this._endInput('error', new Error('Input closed before end'));
    };

    private _readMessages(): void {
        while (!this._inputEnded && !this._closed) {
            let message: JSONRPCMessage | null;
            try {
                message = this._readBuffer.readMessage();
            } catch (err) {
                this.onerror?.(malformedFrame(err));
                continue;
            }
            if (message === null) return;
            this.onmessage?.(message);
        }
    }

    private _endInput(reason: InputEndReason, error?: Error): void {
        if (this._inputEnded || this._closed) return;
        this._stopInput();
        this.oninputend?.(reason, error);
    }

    private _stopInput(): void {
        if (this._inputEnded) return;
        this._inputEnded = true;
        this._input.off('data', this._onData);
        this._input.off('end', this._onEnd);
        this._input.off('error', this._onInputError);
        this._input.off('close', this._onInputClose);
        // A late stream error must still have a listener.
        this._input.on('error', this._reportError);
        this._input.pause();
        this._readBuffer.clear();
        this._pendingBytes = 0;
    }

    // ── Output ───────────────────────────────────────────

    private _waitForDrain(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const settle = (err?: Error): void => {
                this._output.off('drain', onDrain);
                this._output.off('error', onError);
                this._output.off('close', onClose);
                if (err) reject(err);
                else resolve();
            };
            const onDrain = (): void => settle();
            const onError = (err: Error): void => settle(err);
            const onClose = (): void => settle(new Error('Output closed before drain'));
            this._output.once('drain', onDrain);
            this._output.once('error', onError);
            this._output.once('close', onClose);
        });
    }

    private readonly _onOutputError = (err: Error): void => {
        this._outputFailed = true;
        if (this._inputEnded) this.onerror?.(err);
        else this._endInput('error', err);
    };

    private readonly _onOutputClose = (): void => {
        this._outputFailed = true;
        this._endInput('error', new Error('Output closed'));
    };

    private readonly _reportError = (err: Error): void => {
        this.onerror?.(err);
    };
}
