// Deepgram Live Protocol
// Codec for the Deepgram streaming listen API; interim results resend the growing segment
// and may be revised, so only is_final segments belong to the turn

import type { LiveEvent, LiveProtocol } from './types.js';
import { WIRE_SAMPLE_RATE } from './types.js';
import type { DeepgramLiveOptions } from './deepgramTypes.js';
import { getArray, getRecord, getString, isBlank, isRecord, parseJsonObject } from './json.js';
import type { TransportEndpoint } from '../../transport/types.js';

const DEEPGRAM_LISTEN_URL = 'wss://api.deepgram.com/v1/listen';

export class DeepgramLiveProtocol implements LiveProtocol {
    readonly name = 'deepgram' as const;
    readonly sampleRate = WIRE_SAMPLE_RATE;

    private readonly options: Required<DeepgramLiveOptions>;

    constructor(options: DeepgramLiveOptions) {
        this.options = {
            apiKey: options.apiKey,
            model: options.model ?? 'nova-2',
            interim_results: options.interim_results ?? true,
            punctuate: options.punctuate ?? true,
            smart_format: options.smart_format ?? true,
            utterance_end_ms: options.utterance_end_ms ?? 1000,
            vad_events: options.vad_events ?? false,
        };
    }

    endpoint(): TransportEndpoint {
        const params = new URLSearchParams({
            model: this.options.model,
            encoding: 'linear16',
            sample_rate: this.sampleRate.toString(),
            channels: '1',
            interim_results: this.options.interim_results.toString(),
            punctuate: this.options.punctuate.toString(),
            smart_format: this.options.smart_format.toString(),
            utterance_end_ms: this.options.utterance_end_ms.toString(),
            vad_events: this.options.vad_events.toString(),
        });

        return {
            url: `${DEEPGRAM_LISTEN_URL}?${params.toString()}`,
            headers: { Authorization: `Token ${this.options.apiKey}` },
        };
    }

    // Configured entirely through the URL
    encodeSetup(): null {
        return null;
    }

    encodeAudio(pcm: Buffer): Buffer {
        return pcm;
    }

    decode(raw: string): LiveEvent[] {
        const parsed = parseJsonObject(raw);
        if (!parsed.ok) {
            return [{ type: 'decode-failure', raw, detail: parsed.error }];
        }

        const message = parsed.value;
        switch (getString(message, 'type')) {
            case 'Results':
                return this.decodeResults(message);

            case 'UtteranceEnd':
                return [{ type: 'turn-complete' }];

            case 'Error': {
                const error = getString(message, 'error') ?? 'Unknown error';
                const description = getString(message, 'description');
                return [{ type: 'provider-error', detail: description ? `${error}: ${description}` : error }];
            }

            case 'Open':
            case 'Metadata':
            case 'SpeechStarted':
            case 'Close':
                return [];

            default:
                return [{ type: 'unrecognized', raw }];
        }
    }

    private decodeResults(message: Record<string, unknown>): LiveEvent[] {
        const channel = getRecord(message, 'channel');
        const [alternative] = channel ? getArray(channel, 'alternatives') ?? [] : [];
        const transcript = isRecord(alternative) ? getString(alternative, 'transcript') : undefined;

        const events: LiveEvent[] = [];
        if (transcript !== undefined && !isBlank(transcript)) {
            events.push({ type: 'transcript-snapshot', text: transcript, final: message.is_final === true });
        }
        if (message.speech_final === true) {
            events.push({ type: 'turn-complete' });
        }
        return events;
    }
}
