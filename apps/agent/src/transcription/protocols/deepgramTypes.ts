// Deepgram Live API options
// Query parameters for the streaming listen endpoint

export interface DeepgramLiveOptions {
    apiKey: string;
    model?: string; // default: 'nova-2'
    interim_results?: boolean; // default: true
    punctuate?: boolean; // default: true
    smart_format?: boolean; // default: true
    utterance_end_ms?: number; // default: 1000
    vad_events?: boolean; // default: false
}
