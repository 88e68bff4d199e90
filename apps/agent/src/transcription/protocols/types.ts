// Live Protocol Types
// Provider-neutral codec contract between the live session and a provider's wire format

import type { AnswerProviderName, LiveProviderName } from '@earshot/contracts';
import type { TransportEndpoint } from '../../transport/types.js';

/**
 * Semantic events decoded from one inbound provider message.
 * transcript-delta carries new text only; transcript-snapshot resends the
 * growing text of the current segment, and `final` marks its last revision.
 */
export type LiveEvent =
    | { type: 'setup-complete' }
    | { type: 'transcript-delta'; text: string }
    | { type: 'transcript-snapshot'; text: string; final: boolean }
    | { type: 'model-output'; text: string }
    | { type: 'turn-complete'; transcript?: string }
    | { type: 'provider-error'; detail: string }
    | { type: 'unrecognized'; raw: string }
    | { type: 'decode-failure'; raw: string; detail: string };

export interface LiveProtocol {
    readonly name: LiveProviderName;
    /** Input rate the provider expects for mono 16-bit PCM */
    readonly sampleRate: number;
    endpoint(): TransportEndpoint;
    /** null when the provider is configured through the endpoint and acknowledges on open */
    encodeSetup(): string | null;
    /** `pcm` is already mono 16-bit at `sampleRate` */
    encodeAudio(pcm: Buffer): string | Buffer;
    decode(raw: string): LiveEvent[];
}

export interface AnswerRequest {
    url: string;
    headers: Record<string, string>;
    body: string;
}

export interface AnswerProtocol {
    readonly name: AnswerProviderName;
    encodeAnswerRequest(question: string): AnswerRequest;
    /** Text carried by one SSE `data:` payload, or null when it carries none */
    decodeAnswerData(data: string): string | null;
}

export const WIRE_SAMPLE_RATE = 16000;
export const WIRE_MIME_TYPE = `audio/pcm;rate=${WIRE_SAMPLE_RATE}`;

export function buildAnswerPrompt(question: string): string {
    return `Answer this question briefly and directly:\n\nQuestion: ${question}`;
}
