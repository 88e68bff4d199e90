// Event Contracts
// Session event schemas published by the Agent to connected clients
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type { LiveSessionState, SessionErrorInfo } from '../session/index.js';

// ============================================
// SESSION LIFECYCLE EVENTS
// ============================================

export interface SessionStateChangedEvent {
    readonly type: 'session.state';
    readonly payload: {
        readonly sessionId: string;
        readonly state: LiveSessionState;
        readonly previous: LiveSessionState;
        readonly timestamp: number;
    };
}

export interface SessionReconnectingEvent {
    readonly type: 'session.reconnecting';
    readonly payload: {
        readonly sessionId: string;
        readonly attempt: number;
        readonly maxAttempts: number;
        readonly timestamp: number;
    };
}

export interface SessionClosedEvent {
    readonly type: 'session.closed';
    readonly payload: {
        readonly sessionId: string;
        readonly error?: SessionErrorInfo;
        readonly timestamp: number;
    };
}

export interface ProviderErrorEvent {
    readonly type: 'provider.error';
    readonly payload: {
        readonly sessionId: string;
        readonly detail: string;
        readonly timestamp: number;
    };
}

// ============================================
// TRANSCRIPTION EVENTS
// ============================================

export interface TranscriptChunkEvent {
    readonly type: 'transcript.chunk';
    readonly payload: {
        readonly sessionId: string;
        readonly text: string;
        readonly timestamp: number;
    };
}

export interface TurnCompletedEvent {
    readonly type: 'turn.completed';
    readonly payload: {
        readonly sessionId: string;
        readonly text: string;
        readonly empty: boolean;
        readonly timestamp: number;
    };
}

export interface ModelOutputEvent {
    readonly type: 'model.output';
    readonly payload: {
        readonly sessionId: string;
        readonly text: string;
        readonly timestamp: number;
    };
}

// ============================================
// QUESTION/ANSWER EVENTS
// ============================================

export interface QuestionDetectedEvent {
    readonly type: 'question.detected';
    readonly payload: {
        readonly sessionId: string;
        readonly question: string;
        readonly timestamp: number;
    };
}

export interface AnswerChunkEvent {
    readonly type: 'answer.chunk';
    readonly payload: {
        readonly sessionId: string;
        readonly question: string;
        readonly text: string;
        readonly timestamp: number;
    };
}

export interface AnswerCompletedEvent {
    readonly type: 'answer.completed';
    readonly payload: {
        readonly sessionId: string;
        readonly question: string;
        readonly answer: string;
        readonly timestamp: number;
    };
}

export interface AnswerFailedEvent {
    readonly type: 'answer.failed';
    readonly payload: {
        readonly sessionId: string;
        readonly question: string;
        readonly error: string;
        readonly timestamp: number;
    };
}

// ============================================
// UNION TYPE
// ============================================

export type SessionEvent =
    | SessionStateChangedEvent
    | SessionReconnectingEvent
    | SessionClosedEvent
    | ProviderErrorEvent
    | TranscriptChunkEvent
    | TurnCompletedEvent
    | ModelOutputEvent
    | QuestionDetectedEvent
    | AnswerChunkEvent
    | AnswerCompletedEvent
    | AnswerFailedEvent;

export type SessionEventType = SessionEvent['type'];
