// OpenAI Realtime and Responses API message types

export interface OpenAiSessionUpdateMessage {
    type: 'session.update';
    session: {
        modalities: string[];
        instructions: string;
        input_audio_format: 'pcm16';
        input_audio_transcription: {
            model: string;
        };
        turn_detection: {
            type: 'server_vad';
        };
    };
}

export interface OpenAiAudioAppendMessage {
    type: 'input_audio_buffer.append';
    audio: string;
}

export interface OpenAiResponsesRequest {
    model: string;
    input: string;
    stream: true;
}

export interface OpenAiRealtimeOptions {
    apiKey: string;
    model?: string; // default: 'gpt-4o-realtime-preview'
    transcriptionModel?: string; // default: 'gpt-4o-mini-transcribe'
    instructions?: string;
}

export interface OpenAiAnswerOptions {
    apiKey: string;
    model?: string; // default: 'gpt-4o-mini'
}
