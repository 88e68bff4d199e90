// Gemini Live Protocol
// Codec for the Gemini Live WebSocket API and Gemini streamed answers

import type {
    AnswerProtocol,
    AnswerRequest,
    LiveEvent,
    LiveProtocol,
} from './types.js';
import { WIRE_MIME_TYPE, WIRE_SAMPLE_RATE, buildAnswerPrompt } from './types.js';
import type {
    GeminiAnswerOptions,
    GeminiGenerateContentRequest,
    GeminiLiveOptions,
    GeminiRealtimeInputMessage,
    GeminiSetupMessage,
} from './geminiTypes.js';
import { getArray, getRecord, getString, isBlank, isRecord, parseJsonObject } from './json.js';
import type { TransportEndpoint } from '../../transport/types.js';

const GEMINI_LIVE_URL =
    'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1alpha.GenerativeService.BidiGenerateContent';
const GEMINI_REST_URL = 'https://generativelanguage.googleapis.com/v1/models';

export const DEFAULT_GEMINI_LIVE_MODEL = 'models/gemini-2.5-flash-native-audio-preview-12-2025';
export const DEFAULT_GEMINI_ANSWER_MODEL = 'gemini-2.5-flash';

export class GeminiLiveProtocol implements LiveProtocol {
    readonly name = 'gemini' as const;
    readonly sampleRate = WIRE_SAMPLE_RATE;

    private readonly options: Required<GeminiLiveOptions>;

    constructor(options: GeminiLiveOptions) {
        this.options = {
            apiKey: options.apiKey,
            model: options.model ?? DEFAULT_GEMINI_LIVE_MODEL,
            responseModalities: options.responseModalities ?? ['AUDIO'],
            systemInstruction: options.systemInstruction ?? 'Listen to the user and do not speak',
        };
    }

    endpoint(): TransportEndpoint {
        return { url: `${GEMINI_LIVE_URL}?key=${encodeURIComponent(this.options.apiKey)}` };
    }

    encodeSetup(): string {
        const message: GeminiSetupMessage = {
            setup: {
                model: this.options.model,
                generationConfig: {
                    responseModalities: this.options.responseModalities,
                },
                inputAudioTranscription: {},
                systemInstruction: {
                    parts: [{ text: this.options.systemInstruction }],
                },
            },
        };
        return JSON.stringify(message);
    }

    encodeAudio(pcm: Buffer): string {
        const message: GeminiRealtimeInputMessage = {
            realtimeInput: {
                mediaChunks: [
                    {
                        mimeType: WIRE_MIME_TYPE,
                        data: pcm.toString('base64'),
                    },
                ],
            },
        };
        return JSON.stringify(message);
    }

    decode(raw: string): LiveEvent[] {
        const parsed = parseJsonObject(raw);
        if (!parsed.ok) {
            return [{ type: 'decode-failure', raw, detail: parsed.error }];
        }

        const message = parsed.value;
        const events: LiveEvent[] = [];

        if ('setupComplete' in message) {
            events.push({ type: 'setup-complete' });
        }

        const serverContent = getRecord(message, 'serverContent');
        if (serverContent) {
            const inputTranscription = getRecord(serverContent, 'inputTranscription');
            const chunk = inputTranscription ? getString(inputTranscription, 'text') : undefined;
            if (chunk !== undefined && !isBlank(chunk)) {
                events.push({ type: 'transcript-delta', text: chunk });
            }

            const modelTurn = getRecord(serverContent, 'modelTurn');
            const parts = modelTurn ? getArray(modelTurn, 'parts') : undefined;
            for (const part of parts ?? []) {
                const text = isRecord(part) ? getString(part, 'text') : undefined;
                if (text !== undefined && !isBlank(text)) {
                    events.push({ type: 'model-output', text });
                }
            }

            // Turn boundary comes last so the chunk above lands in the closing turn
            if (serverContent.turnComplete === true) {
                events.push({ type: 'turn-complete' });
            }
        }

        if ('error' in message) {
            events.push({ type: 'provider-error', detail: JSON.stringify(message.error) });
        }

        if (!serverContent && events.length === 0) {
            events.push({ type: 'unrecognized', raw });
        }

        return events;
    }
}

export class GeminiAnswerProtocol implements AnswerProtocol {
    readonly name = 'gemini' as const;

    private readonly apiKey: string;
    private readonly model: string;

    constructor(options: GeminiAnswerOptions) {
        this.apiKey = options.apiKey;
        this.model = options.model ?? DEFAULT_GEMINI_ANSWER_MODEL;
    }

    encodeAnswerRequest(question: string): AnswerRequest {
        const payload: GeminiGenerateContentRequest = {
            contents: [{ parts: [{ text: buildAnswerPrompt(question) }] }],
        };

        return {
            url: `${GEMINI_REST_URL}/${this.model}:streamGenerateContent?alt=sse&key=${encodeURIComponent(this.apiKey)}`,
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(payload),
        };
    }

    decodeAnswerData(data: string): string | null {
        const parsed = parseJsonObject(data);
        if (!parsed.ok) {
            return null;
        }

        const [candidate] = getArray(parsed.value, 'candidates') ?? [];
        const content = isRecord(candidate) ? getRecord(candidate, 'content') : undefined;
        const [part] = content ? getArray(content, 'parts') ?? [] : [];
        const text = isRecord(part) ? getString(part, 'text') : undefined;

        return text ? text : null;
    }
}
