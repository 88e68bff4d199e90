// Live Session
// Connection state machine for one live provider session:
// connect, setup handshake, audio streaming, bounded reconnection and teardown

import type { LiveSessionState, LiveSessionStatus } from '@earshot/contracts';
import type { AnswerSource } from '../answers/AnswerStreamer.js';
import { toWirePcm } from '../audio/pcm.js';
import type { AudioFrame } from '../audio/types.js';
import type { ReconnectPolicy } from '../config.js';
import { createWebSocketTransport } from '../transport/WebSocketTransport.js';
import type { Transport, TransportFactory } from '../transport/types.js';
import { CompletionSignal } from '../utils/CompletionSignal.js';
import {
    CancelledError,
    ConflictError,
    DecodeFailureError,
    ProviderError,
    SessionError,
    TransportFailureError,
    isTransientSessionError,
    logError,
    toSessionError,
} from '../utils/errors.js';
import { sleep, withRetry, type DelayFn } from '../utils/retry.js';
import { TypedEmitter, type Unsubscribe } from '../utils/TypedEmitter.js';
import type { LiveEvent, LiveProtocol } from './protocols/types.js';
import { TranscriptAssembler } from './TranscriptAssembler.js';

export type LiveSessionEvents = {
    state: [state: LiveSessionState, previous: LiveSessionState];
    'input-transcript': [text: string];
    'turn-complete': [turn: string];
    'model-output': [text: string];
    'provider-error': [detail: string];
    reconnecting: [attempt: number, maxAttempts: number];
    /** Terminal; carries the error when the session died rather than being disconnected */
    closed: [error: SessionError | null];
};

export interface LiveSessionOptions {
    sessionId: string;
    protocol: LiveProtocol;
    answers?: AnswerSource;
    transportFactory?: TransportFactory;
    setupTimeoutMs?: number;
    reconnect?: Partial<ReconnectPolicy>;
    delay?: DelayFn;
    disconnectTimeoutMs?: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
    maxAttempts: 5,
    initialDelayMs: 2000,
    maxDelayMs: 30000,
};

const DEFAULT_SETUP_TIMEOUT_MS = 10000;
const DEFAULT_DISCONNECT_TIMEOUT_MS = 2000;
const LOG_PREVIEW_LENGTH = 200;

interface Connection {
    transport: Transport;
    setup: CompletionSignal;
    lost: SessionError | null;
    loop: Promise<void> | null;
}

function preview(raw: string): string {
    return raw.length > LOG_PREVIEW_LENGTH ? `${raw.slice(0, LOG_PREVIEW_LENGTH)}...` : raw;
}

async function waitAtMost(task: Promise<unknown>, timeoutMs: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
    });

    try {
        await Promise.race([task, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export class LiveSession {
    readonly sessionId: string;

    private readonly protocol: LiveProtocol;
    private readonly answers?: AnswerSource;
    private readonly transportFactory: TransportFactory;
    private readonly setupTimeoutMs: number;
    private readonly reconnectPolicy: ReconnectPolicy;
    private readonly delay: DelayFn;
    private readonly disconnectTimeoutMs: number;
    private readonly logTag: string;

    private readonly events: TypedEmitter<LiveSessionEvents>;
    private readonly assembler: TranscriptAssembler;
    private readonly abort = new AbortController();

    private state: LiveSessionState = 'idle';
    private connection: Connection | null = null;
    private reconnectTask: Promise<void> | null = null;
    private disconnectTask: Promise<void> | null = null;
    private disconnecting = false;
    private terminating = false;
    private closedEmitted = false;

    private lastError: SessionError | null = null;
    private serverError: string | null = null;
    private reconnectAttempts = 0;
    private bytesSent = 0;
    private framesSent = 0;
    private connectedAt?: number;
    private lastEventAt?: number;

    constructor(options: LiveSessionOptions) {
        this.sessionId = options.sessionId;
        this.protocol = options.protocol;
        this.answers = options.answers;
        this.transportFactory = options.transportFactory ?? createWebSocketTransport;
        this.setupTimeoutMs = options.setupTimeoutMs ?? DEFAULT_SETUP_TIMEOUT_MS;
        this.reconnectPolicy = {
            maxAttempts: options.reconnect?.maxAttempts ?? DEFAULT_RECONNECT_POLICY.maxAttempts,
            initialDelayMs: options.reconnect?.initialDelayMs ?? DEFAULT_RECONNECT_POLICY.initialDelayMs,
            maxDelayMs: options.reconnect?.maxDelayMs ?? DEFAULT_RECONNECT_POLICY.maxDelayMs,
        };
        this.delay = options.delay ?? sleep;
        this.disconnectTimeoutMs = options.disconnectTimeoutMs ?? DEFAULT_DISCONNECT_TIMEOUT_MS;
        this.logTag = `live-session:${options.sessionId}`;

        this.events = new TypedEmitter(this.logTag);
        this.assembler = new TranscriptAssembler();
    }

    get currentState(): LiveSessionState {
        return this.state;
    }

    /** Detail of the most recent provider-reported error */
    get lastServerError(): string | null {
        return this.serverError;
    }

    on<K extends keyof LiveSessionEvents>(
        event: K,
        listener: (...args: LiveSessionEvents[K]) => void
    ): Unsubscribe {
        return this.events.on(event, listener);
    }

    status(): LiveSessionStatus {
        return {
            sessionId: this.sessionId,
            provider: this.protocol.name,
            state: this.state,
            bytesSent: this.bytesSent,
            framesSent: this.framesSent,
            reconnectAttempts: this.reconnectAttempts,
            lastServerError: this.serverError,
            connectedAt: this.connectedAt,
            lastEventAt: this.lastEventAt,
        };
    }

    // ============================================
    // LIFECYCLE
    // ============================================

    /**
     * Open the provider connection and send setup. A failure closes the session;
     * build a new one to try again.
     */
    async connect(): Promise<void> {
        if (this.state !== 'idle') {
            throw new ConflictError(`Cannot connect a session in state '${this.state}'`, {
                sessionId: this.sessionId,
            });
        }

        this.setState('connecting');
        this.assembler.reset();
        console.log(`[${this.logTag}] Connecting to ${this.protocol.name}...`);

        try {
            await this.openConnection();
        } catch (error) {
            if (this.disconnecting) {
                throw new CancelledError('Session disconnected while connecting');
            }

            const failure = toSessionError(error);
            console.error(`[${this.logTag}] Connect failed: ${failure.message}`);
            this.lastError = failure;
            await this.closeWithError(failure);
            throw failure;
        }
    }

    /**
     * Resolves once the provider acknowledges setup. Rejects with SetupTimeoutError,
     * the provider's error, a TransportFailureError when the connection drops first,
     * or CancelledError on disconnect.
     */
    waitForSetupComplete(timeoutMs: number = this.setupTimeoutMs): Promise<void> {
        const connection = this.connection;
        if (!connection) {
            return Promise.reject(this.lastError ?? new TransportFailureError('Session is not connected'));
        }
        return connection.setup.wait(timeoutMs, this.abort.signal);
    }

    /**
     * Send one frame. Dropped silently unless streaming; send failures are only logged.
     */
    sendAudio(frame: AudioFrame): void {
        const connection = this.connection;
        if (this.state !== 'streaming' || !connection) {
            return;
        }

        const pcm = toWirePcm(frame, this.protocol.sampleRate);
        if (pcm.length === 0) {
            return;
        }

        this.framesSent++;
        this.bytesSent += pcm.length;

        connection.transport
            .send(this.protocol.encodeAudio(pcm))
            .catch((error: unknown) => logError(error, this.logTag));
    }

    /**
     * Idempotent and never throws. Cancels waits and reconnects, then closes the connection.
     */
    disconnect(): Promise<void> {
        if (!this.disconnectTask) {
            this.disconnectTask = this.performDisconnect();
        }
        return this.disconnectTask;
    }

    /**
     * Stream an answer over a separate request; uses the session's signal unless one is given
     */
    streamAnswerForQuestion(
        question: string,
        onChunk: (text: string) => void,
        signal?: AbortSignal
    ): Promise<string> {
        if (!this.answers) {
            return Promise.reject(new ConflictError('No answer provider configured for this session', {
                sessionId: this.sessionId,
            }));
        }
        return this.answers.stream(question, onChunk, signal ?? this.abort.signal);
    }

    // ============================================
    // CONNECTION
    // ============================================

    private async openConnection(): Promise<Connection> {
        const transport = this.transportFactory(this.protocol.endpoint());
        const connection: Connection = {
            transport,
            setup: new CompletionSignal(),
            lost: null,
            loop: null,
        };
        this.connection = connection;

        await transport.open(this.abort.signal);
        this.connectedAt = Date.now();

        if (this.state === 'connecting') {
            this.setState('awaiting-setup');
        }
        connection.loop = this.runReceiveLoop(connection);

        const setup = this.protocol.encodeSetup();
        if (setup === null) {
            // Configured through the endpoint; the open connection is the acknowledgement
            this.acknowledgeSetup(connection);
        } else {
            await transport.send(setup);
        }

        return connection;
    }

    private async releaseConnection(reason: string): Promise<void> {
        const connection = this.connection;
        if (!connection) {
            return;
        }
        this.connection = null;

        try {
            await connection.transport.close(1000, reason);
        } catch (error) {
            logError(error, this.logTag);
        }
    }

    private async runReceiveLoop(connection: Connection): Promise<void> {
        const lost = await this.readUntilLost(connection);
        if (lost === null || this.disconnecting || this.connection !== connection) {
            return;
        }

        connection.lost = lost;
        connection.setup.fail(lost);
        console.warn(`[${this.logTag}] Connection lost: ${lost.detail}`);

        switch (this.state) {
            case 'streaming':
                this.startReconnect(lost);
                break;

            case 'awaiting-setup': {
                // Never connected: no reconnect, the setup wait already carries the error
                const failure = this.lastError ?? lost;
                this.lastError = failure;
                await this.closeWithError(failure);
                break;
            }

            default:
                // A reconnect attempt in progress sees the loss through its setup wait
                break;
        }
    }

    private async readUntilLost(connection: Connection): Promise<SessionError | null> {
        const signal = this.abort.signal;

        try {
            while (this.connection === connection) {
                const message = await connection.transport.receive(signal);

                if (message.type === 'close') {
                    const reason = message.reason ? `: ${message.reason}` : '';
                    return new TransportFailureError(`Connection closed (${message.code}${reason})`);
                }

                this.lastEventAt = Date.now();
                for (const event of this.protocol.decode(message.data)) {
                    this.dispatch(event, connection);
                }
            }
            return null;
        } catch (error) {
            if (error instanceof CancelledError || signal.aborted) {
                return null;
            }
            return toSessionError(error);
        }
    }

    private dispatch(event: LiveEvent, connection: Connection): void {
        switch (event.type) {
            case 'setup-complete':
                this.acknowledgeSetup(connection);
                break;

            case 'transcript-delta': {
                const delta = this.assembler.ingest(event.text);
                if (delta !== null) {
                    this.events.emit('input-transcript', delta);
                }
                break;
            }

            case 'transcript-snapshot': {
                const delta = this.assembler.ingestSnapshot(event.text, event.final);
                if (delta !== null) {
                    this.events.emit('input-transcript', delta);
                }
                break;
            }

            case 'turn-complete':
                this.events.emit('turn-complete', this.assembler.completeTurn(event.transcript));
                break;

            case 'model-output':
                this.events.emit('model-output', event.text);
                break;

            case 'provider-error': {
                const error = new ProviderError(event.detail);
                console.error(`[${this.logTag}] ${error.message}`);
                this.serverError = event.detail;
                this.lastError = error;
                connection.setup.fail(error);
                this.events.emit('provider-error', event.detail);
                break;
            }

            case 'decode-failure': {
                const error = new DecodeFailureError(event.detail, event.raw);
                console.warn(`[${this.logTag}] ${error.message}: ${preview(error.raw)}`);
                break;
            }

            case 'unrecognized':
                console.log(`[${this.logTag}] Unhandled message: ${preview(event.raw)}`);
                break;
        }
    }

    private acknowledgeSetup(connection: Connection): void {
        if (connection.setup.resolve()) {
            console.log(`[${this.logTag}] Setup complete`);
        }
        if (this.state === 'awaiting-setup') {
            this.setState('streaming');
        }
    }

    // ============================================
    // RECONNECT & TEARDOWN
    // ============================================

    private startReconnect(cause: SessionError): void {
        this.reconnectTask = this.reconnect(cause).catch((error: unknown) => logError(error, this.logTag));
    }

    private async reconnect(cause: SessionError): Promise<void> {
        this.setState('reconnecting');
        await this.releaseConnection('Reconnecting');

        const { maxAttempts, initialDelayMs, maxDelayMs } = this.reconnectPolicy;
        let lastError: SessionError = cause;

        try {
            await withRetry(async (attempt) => {
                this.reconnectAttempts = attempt;
                // Mid-turn text cannot be resumed on a new connection
                this.assembler.resetTurn();
                console.log(`[${this.logTag}] Reconnect attempt ${attempt}/${maxAttempts}`);
                this.events.emit('reconnecting', attempt, maxAttempts);

                try {
                    const connection = await this.openConnection();
                    await connection.setup.wait(this.setupTimeoutMs, this.abort.signal);
                    if (connection.lost) {
                        throw connection.lost;
                    }
                } catch (error) {
                    if (error instanceof CancelledError) {
                        throw error;
                    }
                    lastError = toSessionError(error);
                    console.warn(`[${this.logTag}] Reconnect attempt ${attempt} failed: ${lastError.message}`);
                    await this.releaseConnection('Reconnect attempt failed');
                    throw lastError;
                }
            }, {
                maxAttempts,
                initialDelayMs,
                maxDelayMs,
                signal: this.abort.signal,
                delay: this.delay,
                shouldRetry: isTransientSessionError,
                onRetry: (_error, attempt, delayMs) => {
                    console.log(`[${this.logTag}] Retrying in ${delayMs}ms after attempt ${attempt}`);
                },
            });
        } catch (error) {
            if (this.disconnecting || error instanceof CancelledError) {
                return;
            }
            console.error(`[${this.logTag}] Giving up on reconnect: ${lastError.message}`);
            this.lastError = lastError;
            await this.closeWithError(lastError);
            return;
        }

        console.log(`[${this.logTag}] Reconnected after ${this.reconnectAttempts} attempt(s)`);
        this.setState('streaming');
    }

    private async closeWithError(error: SessionError): Promise<void> {
        if (this.state === 'closed' || this.terminating) {
            return;
        }
        this.terminating = true;

        this.abort.abort();
        await this.releaseConnection('Session closed');
        this.setState('closed');
        this.emitClosed(error);
    }

    private async performDisconnect(): Promise<void> {
        this.disconnecting = true;
        if (this.state === 'closed') {
            return;
        }

        console.log(`[${this.logTag}] Disconnecting...`);

        try {
            const connection = this.connection;
            this.abort.abort();
            connection?.setup.fail(new CancelledError('Session disconnected'));

            const pending: Promise<void>[] = [];
            if (connection?.loop) pending.push(connection.loop);
            if (this.reconnectTask) pending.push(this.reconnectTask);
            await waitAtMost(Promise.all(pending), this.disconnectTimeoutMs);

            await this.releaseConnection('Client disconnecting');
        } catch (error) {
            logError(error, this.logTag);
        }

        this.setState('closed');
        this.emitClosed(null);
        console.log(`[${this.logTag}] Disconnected. Frames: ${this.framesSent}, bytes: ${this.bytesSent}`);
    }

    private setState(next: LiveSessionState): void {
        const previous = this.state;
        if (previous === next || previous === 'closed') {
            return;
        }

        this.state = next;
        console.log(`[${this.logTag}] ${previous} -> ${next}`);
        this.events.emit('state', next, previous);
    }

    private emitClosed(error: SessionError | null): void {
        if (this.closedEmitted) {
            return;
        }
        this.closedEmitted = true;
        this.events.emit('closed', error);
    }
}
