// OpenAI Realtime Protocol
// Codec for the OpenAI Realtime WebSocket API and Responses API streamed answers

import type {
    AnswerProtocol,
    AnswerRequest,
    LiveEvent,
    LiveProtocol,
} from './types.js';
import { buildAnswerPrompt } from './types.js';
import type {
    OpenAiAnswerOptions,
    OpenAiAudioAppendMessage,
    OpenAiRealtimeOptions,
    OpenAiResponsesRequest,
    OpenAiSessionUpdateMessage,
} from './openaiTypes.js';
import { getString, isBlank, parseJsonObject } from './json.js';
import type { TransportEndpoint } from '../../transport/types.js';

const OPENAI_REALTIME_URL = 'wss://api.openai.com/v1/realtime';
const OPENAI_RESPONSES_URL = 'https://api.openai.com/v1/responses';

// Realtime pcm16 input is 24 kHz mono
const OPENAI_SAMPLE_RATE = 24000;

export const DEFAULT_OPENAI_REALTIME_MODEL = 'gpt-4o-realtime-preview';
export const DEFAULT_OPENAI_TRANSCRIPTION_MODEL = 'gpt-4o-mini-transcribe';
export const DEFAULT_OPENAI_ANSWER_MODEL = 'gpt-4o-mini';

export class OpenAiRealtimeProtocol implements LiveProtocol {
    readonly name = 'openai' as const;
    readonly sampleRate = OPENAI_SAMPLE_RATE;

    private readonly options: Required<OpenAiRealtimeOptions>;

    constructor(options: OpenAiRealtimeOptions) {
        this.options = {
            apiKey: options.apiKey,
            model: options.model ?? DEFAULT_OPENAI_REALTIME_MODEL,
            transcriptionModel: options.transcriptionModel ?? DEFAULT_OPENAI_TRANSCRIPTION_MODEL,
            instructions: options.instructions
                ?? 'Provide verbatim transcription of the user audio. Do not answer or summarize.',
        };
    }

    endpoint(): TransportEndpoint {
        return {
            url: `${OPENAI_REALTIME_URL}?model=${encodeURIComponent(this.options.model)}`,
            headers: {
                Authorization: `Bearer ${this.options.apiKey}`,
                'OpenAI-Beta': 'realtime=v1',
            },
        };
    }

    encodeSetup(): string {
        const message: OpenAiSessionUpdateMessage = {
            type: 'session.update',
            session: {
                modalities: ['text'],
                instructions: this.options.instructions,
                input_audio_format: 'pcm16',
                input_audio_transcription: {
                    model: this.options.transcriptionModel,
                },
                turn_detection: {
                    type: 'server_vad',
                },
            },
        };
        return JSON.stringify(message);
    }

    encodeAudio(pcm: Buffer): string {
        const message: OpenAiAudioAppendMessage = {
            type: 'input_audio_buffer.append',
            audio: pcm.toString('base64'),
        };
        return JSON.stringify(message);
    }

    decode(raw: string): LiveEvent[] {
        const parsed = parseJsonObject(raw);
        if (!parsed.ok) {
            return [{ type: 'decode-failure', raw, detail: parsed.error }];
        }

        const message = parsed.value;
        switch (getString(message, 'type')) {
            case 'session.created':
            case 'session.updated':
                return [{ type: 'setup-complete' }];

            case 'error':
                return [{
                    type: 'provider-error',
                    detail: 'error' in message ? JSON.stringify(message.error) : raw,
                }];

            case 'conversation.item.input_audio_transcription.delta': {
                const delta = getString(message, 'delta');
                return delta !== undefined && !isBlank(delta)
                    ? [{ type: 'transcript-delta', text: delta }]
                    : [];
            }

            case 'conversation.item.input_audio_transcription.completed': {
                // The completed transcript supersedes whatever deltas were buffered
                const transcript = getString(message, 'transcript');
                return transcript !== undefined && !isBlank(transcript)
                    ? [{ type: 'turn-complete', transcript }]
                    : [{ type: 'turn-complete' }];
            }

            case 'response.text.delta': {
                const delta = getString(message, 'delta');
                return delta !== undefined && !isBlank(delta)
                    ? [{ type: 'model-output', text: delta }]
                    : [];
            }

            default:
                return [{ type: 'unrecognized', raw }];
        }
    }
}

export class OpenAiAnswerProtocol implements AnswerProtocol {
    readonly name = 'openai' as const;

    private readonly apiKey: string;
    private readonly model: string;

    constructor(options: OpenAiAnswerOptions) {
        this.apiKey = options.apiKey;
        this.model = options.model ?? DEFAULT_OPENAI_ANSWER_MODEL;
    }

    encodeAnswerRequest(question: string): AnswerRequest {
        const payload: OpenAiResponsesRequest = {
            model: this.model,
            input: buildAnswerPrompt(question),
            stream: true,
        };

        return {
            url: OPENAI_RESPONSES_URL,
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${this.apiKey}`,
            },
            body: JSON.stringify(payload),
        };
    }

    decodeAnswerData(data: string): string | null {
        const parsed = parseJsonObject(data);
        if (!parsed.ok || getString(parsed.value, 'type') !== 'response.output_text.delta') {
            return null;
        }

        const delta = getString(parsed.value, 'delta');
        return delta ? delta : null;
    }
}
