// Question Trigger
// Answers each new question found in completed turns, once per recording session

import type { AnswerSource } from '../answers/AnswerStreamer.js';
import { CancelledError, getErrorMessage, logError } from '../utils/errors.js';
import { TypedEmitter, type Unsubscribe } from '../utils/TypedEmitter.js';
import { AnsweredQuestionSet, QuestionDetector } from './QuestionDetector.js';

export type QuestionTriggerEvents = {
    'question-detected': [question: string];
    'answer-chunk': [question: string, text: string];
    'answer-complete': [question: string, answer: string];
    'answer-failed': [question: string, error: Error];
};

export class QuestionTrigger {
    private readonly answered = new AnsweredQuestionSet();
    private readonly inFlight = new Set<Promise<void>>();
    private readonly events: TypedEmitter<QuestionTriggerEvents>;
    // Independent of the live session so teardown leaves answers running
    private controller = new AbortController();

    constructor(
        private readonly answers: AnswerSource,
        private readonly logTag: string = 'questions'
    ) {
        this.events = new TypedEmitter(logTag);
    }

    on<K extends keyof QuestionTriggerEvents>(
        event: K,
        listener: (...args: QuestionTriggerEvents[K]) => void
    ): Unsubscribe {
        return this.events.on(event, listener);
    }

    get answeredCount(): number {
        return this.answered.size;
    }

    get pendingAnswers(): number {
        return this.inFlight.size;
    }

    /**
     * Inspect a finalized turn. Returns the question sent for answering,
     * or null when the turn has no new question.
     */
    handleTurn(turn: string): string | null {
        const question = QuestionDetector.extract(turn);
        if (question === null) {
            return null;
        }

        if (!this.answered.testAndAdd(question)) {
            console.log(`[${this.logTag}] Skipping already answered question: "${question}"`);
            return null;
        }

        console.log(`[${this.logTag}] Question detected: "${question}"`);
        this.events.emit('question-detected', question);

        const task: Promise<void> = this.answer(question, this.controller.signal).finally(() => {
            this.inFlight.delete(task);
        });
        this.inFlight.add(task);

        return question;
    }

    /** Resolves once every in-flight answer has finished */
    async drain(): Promise<void> {
        await Promise.all([...this.inFlight]);
    }

    /** Abort in-flight answers; later questions get a fresh signal */
    cancelAll(): void {
        this.controller.abort();
        this.controller = new AbortController();
    }

    /** Forget answered questions, at the start of a recording session */
    reset(): void {
        this.answered.clear();
    }

    private async answer(question: string, signal: AbortSignal): Promise<void> {
        try {
            const answer = await this.answers.stream(
                question,
                (text) => this.events.emit('answer-chunk', question, text),
                signal
            );

            if (signal.aborted) {
                this.events.emit('answer-failed', question, new CancelledError('Answer cancelled'));
                return;
            }
            this.events.emit('answer-complete', question, answer);
        } catch (error) {
            logError(error, this.logTag);
            this.events.emit(
                'answer-failed',
                question,
                error instanceof Error ? error : new Error(getErrorMessage(error))
            );
        }
    }
}
