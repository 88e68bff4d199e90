// Session Manager
// Active recording sessions by id, built from the agent configuration

import type { LiveSessionStatus } from '@earshot/contracts';
import { AnswerStreamer, type FetchFn } from '../answers/AnswerStreamer.js';
import { startCapture } from '../audio/capture.js';
import type { AgentConfig } from '../config.js';
import type { SSEConnectionManager } from '../sse/ConnectionManager.js';
import { createAnswerProtocol, createLiveProtocol } from '../transcription/protocols/index.js';
import type { TransportFactory } from '../transport/types.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { DelayFn } from '../utils/retry.js';
import { AudioSessionController, type FrameSourceFactory } from './AudioSessionController.js';

export interface SessionManagerDeps {
    frameSource?: FrameSourceFactory;
    transportFactory?: TransportFactory;
    fetchImpl?: FetchFn;
    delay?: DelayFn;
}

export class SessionManager {
    /** Sessions from the start request on, including those still connecting */
    private readonly sessions = new Map<string, AudioSessionController>();

    constructor(
        private readonly config: AgentConfig,
        private readonly sse: SSEConnectionManager,
        private readonly deps: SessionManagerDeps = {}
    ) {}

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    list(): LiveSessionStatus[] {
        return [...this.sessions.values()].map((controller) => controller.status());
    }

    async start(sessionId: string): Promise<LiveSessionStatus> {
        if (this.sessions.has(sessionId)) {
            throw new ConflictError('Session already active', { sessionId });
        }

        // Configuration problems surface before anything connects
        const frameSource = this.resolveFrameSource();
        const protocol = createLiveProtocol(this.config);
        const answers = new AnswerStreamer(createAnswerProtocol(this.config), {
            fetchImpl: this.deps.fetchImpl,
        });

        const controller = new AudioSessionController({
            sessionId,
            protocol,
            answers,
            frameSource,
            transportFactory: this.deps.transportFactory,
            setupTimeoutMs: this.config.setupTimeoutMs,
            reconnect: this.config.reconnect,
            delay: this.deps.delay,
        });
        controller.subscribe((event) => {
            this.sse.broadcast(sessionId, event);
            if (event.type === 'session.closed' && event.payload.error) {
                this.drop(sessionId, controller);
            }
        });

        // Registered before connecting so clients can follow the handshake
        this.sessions.set(sessionId, controller);
        try {
            return await controller.start();
        } catch (error) {
            this.drop(sessionId, controller);
            throw error;
        }
    }

    /**
     * @returns number of distinct questions answered in the session
     */
    async stop(sessionId: string, cancelAnswers: boolean = false): Promise<number> {
        const controller = this.sessions.get(sessionId);
        if (!controller) {
            throw new NotFoundError('Session', sessionId);
        }

        this.sessions.delete(sessionId);
        const questionsAnswered = await controller.stop({ cancelAnswers });
        this.sse.closeSessionConnections(sessionId);
        return questionsAnswered;
    }

    async stopAll(): Promise<void> {
        await Promise.all([...this.sessions.keys()].map((sessionId) => this.stop(sessionId, true)));
    }

    /** Forget a session that ended without a stop request */
    private drop(sessionId: string, controller: AudioSessionController): void {
        if (this.sessions.get(sessionId) !== controller) {
            return;
        }
        this.sessions.delete(sessionId);
        this.sse.closeSessionConnections(sessionId);
        console.log(`[sessions] Dropped session ${sessionId}`);
    }

    private resolveFrameSource(): FrameSourceFactory {
        if (this.deps.frameSource) {
            return this.deps.frameSource;
        }

        const { command, args, format } = this.config.capture;
        if (!command) {
            throw new ValidationError('CAPTURE_COMMAND is not configured');
        }
        return (sessionId) => startCapture(sessionId, { command, args, format });
    }
}
