// Question trigger: detection events, de-duplication and answer lifecycle

import { describe, it, expect, vi } from 'vitest';
import type { AnswerSource } from '../src/answers/AnswerStreamer.js';
import { QuestionTrigger } from '../src/intent/QuestionTrigger.js';
import { CancelledError, ExternalServiceError } from '../src/utils/errors.js';

type StreamArgs = Parameters<AnswerSource['stream']>;

function recordEvents(trigger: QuestionTrigger): string[] {
    const events: string[] = [];
    trigger.on('question-detected', (question) => events.push(`detected:${question}`));
    trigger.on('answer-chunk', (_question, text) => events.push(`chunk:${text}`));
    trigger.on('answer-complete', (_question, answer) => events.push(`complete:${answer}`));
    trigger.on('answer-failed', (_question, error) => events.push(`failed:${error.message}`));
    return events;
}

describe('QuestionTrigger', () => {
    it('streams an answer for a detected question', async () => {
        const stream = vi.fn(async (...[, onChunk]: StreamArgs) => {
            onChunk('It is ');
            onChunk('noon.');
            return 'It is noon.';
        });
        const trigger = new QuestionTrigger({ stream });
        const events = recordEvents(trigger);

        expect(trigger.handleTurn('So. What time is it?')).toBe('What time is it?');
        expect(trigger.pendingAnswers).toBe(1);
        await trigger.drain();

        expect(events).toEqual([
            'detected:What time is it?',
            'chunk:It is ',
            'chunk:noon.',
            'complete:It is noon.',
        ]);
        expect(stream).toHaveBeenCalledWith('What time is it?', expect.any(Function), expect.any(AbortSignal));
        expect(trigger.pendingAnswers).toBe(0);
        expect(trigger.answeredCount).toBe(1);
    });

    it('answers a repeated question only once', async () => {
        const stream = vi.fn(async (..._args: StreamArgs) => 'Yes.');
        const trigger = new QuestionTrigger({ stream });

        expect(trigger.handleTurn('Is it raining?')).toBe('Is it raining?');
        expect(trigger.handleTurn('is IT   raining?')).toBeNull();
        await trigger.drain();

        expect(stream).toHaveBeenCalledTimes(1);
        expect(trigger.answeredCount).toBe(1);
    });

    it('ignores turns without a question', () => {
        const stream = vi.fn(async (..._args: StreamArgs) => '');
        const trigger = new QuestionTrigger({ stream });

        expect(trigger.handleTurn('Thanks, that helps.')).toBeNull();
        expect(stream).not.toHaveBeenCalled();
    });

    it('reports a failed answer', async () => {
        const failure = new ExternalServiceError('answers', 'Answer request failed with status 500: boom');
        const stream = vi.fn(async (..._args: StreamArgs): Promise<string> => {
            throw failure;
        });
        const trigger = new QuestionTrigger({ stream });
        const failed: Error[] = [];
        trigger.on('answer-failed', (_question, error) => failed.push(error));

        trigger.handleTurn('Why is the sky blue?');
        await trigger.drain();

        expect(failed).toEqual([failure]);
    });

    it('cancels in-flight answers and keeps answering afterwards', async () => {
        const signals: AbortSignal[] = [];
        const stream = vi.fn((...[, , signal]: StreamArgs) => {
            if (signal) signals.push(signal);
            return new Promise<string>((resolve) => {
                signal?.addEventListener('abort', () => resolve('partial'), { once: true });
            });
        });
        const trigger = new QuestionTrigger({ stream });
        const failed: Error[] = [];
        trigger.on('answer-failed', (_question, error) => failed.push(error));

        trigger.handleTurn('First question?');
        trigger.cancelAll();
        await trigger.drain();

        expect(failed).toHaveLength(1);
        expect(failed[0]).toBeInstanceOf(CancelledError);
        expect(signals[0]?.aborted).toBe(true);

        trigger.handleTurn('Second question?');
        expect(signals[1]?.aborted).toBe(false);
    });

    it('answers questions again after reset', async () => {
        const stream = vi.fn(async (..._args: StreamArgs) => 'Yes.');
        const trigger = new QuestionTrigger({ stream });

        trigger.handleTurn('Is it raining?');
        await trigger.drain();
        trigger.reset();

        expect(trigger.answeredCount).toBe(0);
        expect(trigger.handleTurn('Is it raining?')).toBe('Is it raining?');
        await trigger.drain();
        expect(stream).toHaveBeenCalledTimes(2);
    });
});
