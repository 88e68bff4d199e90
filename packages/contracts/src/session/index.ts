// Session Contracts
// Shared type definitions for live session lifecycle between the Agent and its clients
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

// ============================================
// PROVIDERS
// ============================================

export type LiveProviderName = 'gemini' | 'openai' | 'deepgram';

export type AnswerProviderName = 'gemini' | 'openai';

// ============================================
// AUDIO
// ============================================

export interface AudioFormat {
    readonly sampleRate: number;
    readonly bitDepth: number;
    readonly channels: number;
}

// ============================================
// SESSION STATE
// ============================================

export type LiveSessionState =
    | 'idle'
    | 'connecting'
    | 'awaiting-setup'
    | 'streaming'
    | 'reconnecting'
    | 'closed';

export type SessionErrorKind =
    | 'transport-failure'
    | 'setup-timeout'
    | 'provider-error'
    | 'decode-failure';

export interface SessionErrorInfo {
    readonly kind: SessionErrorKind;
    readonly message: string;
}

export interface LiveSessionStatus {
    readonly sessionId: string;
    readonly provider: LiveProviderName;
    readonly state: LiveSessionState;
    readonly bytesSent: number;
    readonly framesSent: number;
    readonly reconnectAttempts: number;
    readonly lastServerError: string | null;
    readonly connectedAt?: number;
    readonly lastEventAt?: number;
}

// ============================================
// HTTP REQUEST/RESPONSE SHAPES
// ============================================

export interface StartSessionRequest {
    readonly sessionId: string;
}

export interface StartSessionResponse {
    readonly ok: boolean;
    readonly sessionId: string;
    readonly status?: LiveSessionStatus;
    readonly error?: string;
}

export interface StopSessionRequest {
    readonly sessionId: string;
    readonly cancelAnswers?: boolean;
}

export interface StopSessionResponse {
    readonly ok: boolean;
    readonly sessionId: string;
    readonly questionsAnswered: number;
    readonly error?: string;
}

export interface SessionStatusResponse {
    readonly ok: true;
    readonly sessions: readonly LiveSessionStatus[];
}
