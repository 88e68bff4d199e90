// Audio Session Controller
// Runs one recording session: live connection, frame pump, question answering,
// and republishes everything as SessionEvents for clients

import type { LiveSessionState, LiveSessionStatus, SessionEvent } from '@earshot/contracts';
import type { AnswerSource } from '../answers/AnswerStreamer.js';
import type { AudioFrame } from '../audio/types.js';
import type { ReconnectPolicy } from '../config.js';
import { QuestionTrigger } from '../intent/QuestionTrigger.js';
import { LiveSession } from '../transcription/LiveSession.js';
import type { LiveProtocol } from '../transcription/protocols/types.js';
import type { TransportFactory } from '../transport/types.js';
import { ConflictError, logError } from '../utils/errors.js';
import type { DelayFn } from '../utils/retry.js';
import type { Unsubscribe } from '../utils/TypedEmitter.js';

export interface FrameSource {
    frames: AsyncIterable<AudioFrame>;
    stop: () => Promise<void>;
}

export type FrameSourceFactory = (sessionId: string) => FrameSource;

export type SessionEventListener = (event: SessionEvent) => void;

export interface AudioSessionControllerOptions {
    sessionId: string;
    protocol: LiveProtocol;
    answers: AnswerSource;
    frameSource: FrameSourceFactory;
    transportFactory?: TransportFactory;
    setupTimeoutMs?: number;
    reconnect?: Partial<ReconnectPolicy>;
    delay?: DelayFn;
}

export interface StopOptions {
    /** Abort answers still streaming; by default they run to completion */
    cancelAnswers?: boolean;
}

export class AudioSessionController {
    readonly sessionId: string;

    private readonly live: LiveSession;
    private readonly trigger: QuestionTrigger;
    private readonly frameSourceFactory: FrameSourceFactory;
    private readonly setupTimeoutMs?: number;
    private readonly logTag: string;
    private readonly listeners = new Set<SessionEventListener>();

    private source: FrameSource | null = null;
    private started = false;
    private stopTask: Promise<number> | null = null;

    constructor(options: AudioSessionControllerOptions) {
        this.sessionId = options.sessionId;
        this.frameSourceFactory = options.frameSource;
        this.setupTimeoutMs = options.setupTimeoutMs;
        this.logTag = `session:${options.sessionId}`;

        this.live = new LiveSession({
            sessionId: options.sessionId,
            protocol: options.protocol,
            answers: options.answers,
            transportFactory: options.transportFactory,
            setupTimeoutMs: options.setupTimeoutMs,
            reconnect: options.reconnect,
            delay: options.delay,
        });

        // Answers go through the live session but on the trigger's own signal
        this.trigger = new QuestionTrigger(
            {
                stream: (question, onChunk, signal) =>
                    this.live.streamAnswerForQuestion(question, onChunk, signal),
            },
            `questions:${options.sessionId}`
        );

        this.wireEvents();
    }

    get state(): LiveSessionState {
        return this.live.currentState;
    }

    get questionsAnswered(): number {
        return this.trigger.answeredCount;
    }

    status(): LiveSessionStatus {
        return this.live.status();
    }

    subscribe(listener: SessionEventListener): Unsubscribe {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Connect and wait for setup, then start pumping frames.
     * Rejects when the session never connected; the session is torn down first.
     */
    async start(): Promise<LiveSessionStatus> {
        if (this.started) {
            throw new ConflictError('Session already started', { sessionId: this.sessionId });
        }
        this.started = true;
        this.trigger.reset();

        try {
            await this.live.connect();
            await this.live.waitForSetupComplete(this.setupTimeoutMs);
        } catch (error) {
            await this.live.disconnect();
            throw error;
        }

        const source = this.frameSourceFactory(this.sessionId);
        this.source = source;
        this.pumpFrames(source).catch((error: unknown) => logError(error, this.logTag));

        console.log(`[${this.logTag}] Streaming audio to ${this.live.status().provider}`);
        return this.live.status();
    }

    /**
     * Stop capture and disconnect. Idempotent.
     * @returns number of distinct questions sent for answering
     */
    stop(options: StopOptions = {}): Promise<number> {
        if (!this.stopTask) {
            this.stopTask = this.performStop(options);
        }
        return this.stopTask;
    }

    /** Resolves once every in-flight answer has finished */
    drainAnswers(): Promise<void> {
        return this.trigger.drain();
    }

    private async performStop(options: StopOptions): Promise<number> {
        console.log(`[${this.logTag}] Stopping...`);

        await this.stopSource();
        await this.live.disconnect();

        if (options.cancelAnswers) {
            this.trigger.cancelAll();
        }

        console.log(`[${this.logTag}] Stopped. Questions answered: ${this.trigger.answeredCount}`);
        return this.trigger.answeredCount;
    }

    /** Stop capture once; later frames are no longer pumped */
    private async stopSource(): Promise<void> {
        const source = this.source;
        this.source = null;
        if (!source) {
            return;
        }

        try {
            await source.stop();
        } catch (error) {
            logError(error, this.logTag);
        }
    }

    private async pumpFrames(source: FrameSource): Promise<void> {
        for await (const frame of source.frames) {
            if (this.source !== source) {
                break;
            }
            this.live.sendAudio(frame);
        }
        console.log(`[${this.logTag}] Frame source ended`);
    }

    private wireEvents(): void {
        const sessionId = this.sessionId;

        this.live.on('state', (state, previous) => {
            this.publish({ type: 'session.state', payload: { sessionId, state, previous, timestamp: Date.now() } });
        });

        this.live.on('reconnecting', (attempt, maxAttempts) => {
            this.publish({
                type: 'session.reconnecting',
                payload: { sessionId, attempt, maxAttempts, timestamp: Date.now() },
            });
        });

        this.live.on('closed', (error) => {
            if (error) {
                // The live session died on its own; nothing will consume capture any more
                console.warn(`[${this.logTag}] Live session closed: ${error.message}`);
                this.stopSource().catch((stopError: unknown) => logError(stopError, this.logTag));
            }
            this.publish({
                type: 'session.closed',
                payload: { sessionId, error: error?.toInfo(), timestamp: Date.now() },
            });
        });

        this.live.on('provider-error', (detail) => {
            this.publish({ type: 'provider.error', payload: { sessionId, detail, timestamp: Date.now() } });
        });

        this.live.on('input-transcript', (text) => {
            this.publish({ type: 'transcript.chunk', payload: { sessionId, text, timestamp: Date.now() } });
        });

        this.live.on('model-output', (text) => {
            this.publish({ type: 'model.output', payload: { sessionId, text, timestamp: Date.now() } });
        });

        this.live.on('turn-complete', (text) => {
            const empty = text.length === 0;
            this.publish({ type: 'turn.completed', payload: { sessionId, text, empty, timestamp: Date.now() } });
            if (!empty) {
                this.trigger.handleTurn(text);
            }
        });

        this.trigger.on('question-detected', (question) => {
            this.publish({ type: 'question.detected', payload: { sessionId, question, timestamp: Date.now() } });
        });

        this.trigger.on('answer-chunk', (question, text) => {
            this.publish({ type: 'answer.chunk', payload: { sessionId, question, text, timestamp: Date.now() } });
        });

        this.trigger.on('answer-complete', (question, answer) => {
            this.publish({
                type: 'answer.completed',
                payload: { sessionId, question, answer, timestamp: Date.now() },
            });
        });

        this.trigger.on('answer-failed', (question, error) => {
            this.publish({
                type: 'answer.failed',
                payload: { sessionId, question, error: error.message, timestamp: Date.now() },
            });
        });
    }

    private publish(event: SessionEvent): void {
        for (const listener of this.listeners) {
            try {
                listener(event);
            } catch (error) {
                logError(error, this.logTag);
            }
        }
    }
}
