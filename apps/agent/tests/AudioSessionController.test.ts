// Recording session wiring: setup, frame pump, questions and answers, teardown

import { describe, it, expect, vi } from 'vitest';
import type { SessionEvent } from '@earshot/contracts';
import type { AnswerSource } from '../src/answers/AnswerStreamer.js';
import { AudioSessionController } from '../src/session/AudioSessionController.js';
import { GeminiLiveProtocol } from '../src/transcription/protocols/gemini.js';
import { ConflictError, TransportFailureError } from '../src/utils/errors.js';
import { ackGeminiSetup, fakeTransportFactory, type FakeTransportBehavior } from './helpers/fakeTransport.js';
import { monoFrame, staticFrameSource } from './helpers/frames.js';

type StreamArgs = Parameters<AnswerSource['stream']>;

function questionTurn(text: string): string {
    return JSON.stringify({ serverContent: { inputTranscription: { text }, turnComplete: true } });
}

function createController(
    stream: AnswerSource['stream'],
    behavior: FakeTransportBehavior = ackGeminiSetup
) {
    const { factory, transports } = fakeTransportFactory(() => behavior);
    const source = staticFrameSource([monoFrame, monoFrame]);
    const frameSource = vi.fn((_sessionId: string) => source);
    const controller = new AudioSessionController({
        sessionId: 'session-1',
        protocol: new GeminiLiveProtocol({ apiKey: 'test-key' }),
        answers: { stream },
        frameSource,
        transportFactory: factory,
    });

    const events: SessionEvent[] = [];
    controller.subscribe((event) => events.push(event));

    return { controller, transports, source, frameSource, events };
}

describe('AudioSessionController', () => {
    it('streams frames and answers detected questions', async () => {
        const stream = vi.fn(async (...[, onChunk]: StreamArgs) => {
            onChunk('Sunny.');
            return 'Sunny.';
        });
        const { controller, transports, frameSource, events } = createController(stream);

        const status = await controller.start();
        expect(status).toMatchObject({ sessionId: 'session-1', provider: 'gemini', state: 'streaming' });
        expect(frameSource).toHaveBeenCalledWith('session-1');
        await vi.waitFor(() => expect(transports[0]?.sent).toHaveLength(3));

        transports[0]?.deliver(questionTurn('Weather check. Is it sunny?'));
        await vi.waitFor(() => expect(stream).toHaveBeenCalledTimes(1));
        await controller.drainAnswers();

        expect(events.map((event) => event.type)).toEqual([
            'session.state',
            'session.state',
            'session.state',
            'transcript.chunk',
            'turn.completed',
            'question.detected',
            'answer.chunk',
            'answer.completed',
        ]);
        expect(events[4]?.payload).toMatchObject({ text: 'Weather check. Is it sunny?', empty: false });
        expect(events[7]?.payload).toMatchObject({ question: 'Is it sunny?', answer: 'Sunny.' });
        expect(controller.questionsAnswered).toBe(1);
    });

    it('publishes empty turns without asking for an answer', async () => {
        const stream = vi.fn(async (..._args: StreamArgs) => '');
        const { controller, transports, events } = createController(stream);
        await controller.start();

        transports[0]?.deliver(JSON.stringify({ serverContent: { turnComplete: true } }));

        await vi.waitFor(() => expect(events.map((event) => event.type)).toContain('turn.completed'));
        expect(events.find((event) => event.type === 'turn.completed')?.payload).toMatchObject({ text: '', empty: true });
        expect(stream).not.toHaveBeenCalled();
        await controller.stop();
    });

    it('stops capture, disconnects and reports answered questions', async () => {
        const stream = vi.fn(async (..._args: StreamArgs) => 'Yes.');
        const { controller, transports, source, events } = createController(stream);
        await controller.start();
        transports[0]?.deliver(questionTurn('Is it raining?'));
        await vi.waitFor(() => expect(controller.questionsAnswered).toBe(1));
        await controller.drainAnswers();

        const answered = await controller.stop();

        expect(answered).toBe(1);
        expect(source.stopped()).toBe(true);
        expect(controller.state).toBe('closed');
        expect(transports[0]?.closeCalls).toEqual([{ code: 1000, reason: 'Client disconnecting' }]);
        const last = events.at(-1);
        expect(last).toMatchObject({ type: 'session.closed', payload: { sessionId: 'session-1' } });
        expect(last?.type === 'session.closed' && last.payload.error).toBeUndefined();
        await expect(controller.stop()).resolves.toBe(1);
    });

    it('lets answers finish after stop unless cancelled', async () => {
        let finish: (answer: string) => void = () => {};
        const stream = vi.fn((..._args: StreamArgs) => new Promise<string>((resolve) => {
            finish = resolve;
        }));
        const { controller, transports, events } = createController(stream);
        await controller.start();
        transports[0]?.deliver(questionTurn('Is it raining?'));
        await vi.waitFor(() => expect(stream).toHaveBeenCalledTimes(1));

        await controller.stop();
        finish('Not today.');
        await controller.drainAnswers();

        expect(events.find((event) => event.type === 'answer.completed')?.payload).toMatchObject({
            question: 'Is it raining?',
            answer: 'Not today.',
        });
    });

    it('cancels in-flight answers on request', async () => {
        const stream = vi.fn((...[, , signal]: StreamArgs) => new Promise<string>((resolve) => {
            signal?.addEventListener('abort', () => resolve(''), { once: true });
        }));
        const { controller, transports, events } = createController(stream);
        await controller.start();
        transports[0]?.deliver(questionTurn('Is it raining?'));
        await vi.waitFor(() => expect(stream).toHaveBeenCalledTimes(1));

        await controller.stop({ cancelAnswers: true });
        await controller.drainAnswers();

        expect(events.find((event) => event.type === 'answer.failed')?.payload).toMatchObject({
            question: 'Is it raining?',
            error: 'Answer cancelled',
        });
    });

    it('tears down and rethrows when the session never connects', async () => {
        const stream = vi.fn(async (..._args: StreamArgs) => '');
        const { controller, frameSource, events } = createController(stream, {
            failOpen: new TransportFailureError('connection refused'),
        });

        await expect(controller.start()).rejects.toThrow('Transport failure: connection refused');

        expect(frameSource).not.toHaveBeenCalled();
        expect(controller.state).toBe('closed');
        const closed = events.filter((event) => event.type === 'session.closed');
        expect(closed).toHaveLength(1);
        expect(closed[0]?.payload).toMatchObject({
            error: { kind: 'transport-failure', message: 'Transport failure: connection refused' },
        });
    });

    it('stops capture when reconnects run out', async () => {
        const { factory, transports } = fakeTransportFactory((index) => (
            index === 0 ? ackGeminiSetup : { failOpen: new TransportFailureError('connection refused') }
        ));
        const source = staticFrameSource();
        const controller = new AudioSessionController({
            sessionId: 'session-1',
            protocol: new GeminiLiveProtocol({ apiKey: 'test-key' }),
            answers: { stream: vi.fn(async (..._args: StreamArgs) => '') },
            frameSource: () => source,
            transportFactory: factory,
            reconnect: { maxAttempts: 2 },
            delay: async () => {},
        });
        const events: SessionEvent[] = [];
        controller.subscribe((event) => events.push(event));
        await controller.start();

        transports[0]?.serverClose();

        await vi.waitFor(() => expect(controller.state).toBe('closed'));
        expect(source.stopped()).toBe(true);
        expect(transports).toHaveLength(3);
        expect(events.find((event) => event.type === 'session.closed')?.payload).toMatchObject({
            error: { kind: 'transport-failure', message: 'Transport failure: connection refused' },
        });
    });

    it('can only be started once', async () => {
        const stream = vi.fn(async (..._args: StreamArgs) => '');
        const { controller } = createController(stream);
        await controller.start();

        await expect(controller.start()).rejects.toBeInstanceOf(ConflictError);
        await controller.stop();
    });
});
