// Gemini Live API message types
// Based on the BidiGenerateContent WebSocket and streamGenerateContent REST shapes

export interface GeminiPart {
    text?: string;
}

export interface GeminiSetupMessage {
    setup: {
        model: string;
        generationConfig: {
            responseModalities: string[];
        };
        inputAudioTranscription: Record<string, never>;
        systemInstruction: {
            parts: GeminiPart[];
        };
    };
}

export interface GeminiRealtimeInputMessage {
    realtimeInput: {
        mediaChunks: Array<{
            mimeType: string;
            data: string;
        }>;
    };
}

export interface GeminiGenerateContentRequest {
    contents: Array<{
        parts: GeminiPart[];
    }>;
}

export interface GeminiLiveOptions {
    apiKey: string;
    model?: string; // default: 'models/gemini-2.5-flash-native-audio-preview-12-2025'
    responseModalities?: string[]; // default: ['AUDIO']
    systemInstruction?: string; // default: 'Listen to the user and do not speak'
}

export interface GeminiAnswerOptions {
    apiKey: string;
    model?: string; // default: 'gemini-2.5-flash'
}
