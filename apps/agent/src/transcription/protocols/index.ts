// Protocol Factory
// Builds the configured live and answer codecs

import type { AgentConfig } from '../../config.js';
import { ValidationError } from '../../utils/errors.js';
import { DeepgramLiveProtocol } from './deepgram.js';
import { GeminiAnswerProtocol, GeminiLiveProtocol } from './gemini.js';
import { OpenAiAnswerProtocol, OpenAiRealtimeProtocol } from './openai.js';
import type { AnswerProtocol, LiveProtocol } from './types.js';

export type { AnswerProtocol, AnswerRequest, LiveEvent, LiveProtocol } from './types.js';
export { DeepgramLiveProtocol } from './deepgram.js';
export { GeminiAnswerProtocol, GeminiLiveProtocol } from './gemini.js';
export { OpenAiAnswerProtocol, OpenAiRealtimeProtocol } from './openai.js';

function requireKey(key: string | undefined, variable: string): string {
    if (!key) {
        throw new ValidationError(`${variable} is not configured`, { variable });
    }
    return key;
}

export function createLiveProtocol(config: AgentConfig): LiveProtocol {
    const { apiKeys, models } = config;

    switch (config.liveProvider) {
        case 'gemini':
            return new GeminiLiveProtocol({
                apiKey: requireKey(apiKeys.gemini, 'GEMINI_API_KEY'),
                model: models.geminiLive,
            });
        case 'openai':
            return new OpenAiRealtimeProtocol({
                apiKey: requireKey(apiKeys.openai, 'OPENAI_API_KEY'),
                model: models.openaiRealtime,
                transcriptionModel: models.openaiTranscription,
            });
        case 'deepgram':
            return new DeepgramLiveProtocol({
                apiKey: requireKey(apiKeys.deepgram, 'DEEPGRAM_API_KEY'),
                model: models.deepgram,
            });
    }
}

export function createAnswerProtocol(config: AgentConfig): AnswerProtocol {
    const { apiKeys, models } = config;

    switch (config.answerProvider) {
        case 'gemini':
            return new GeminiAnswerProtocol({
                apiKey: requireKey(apiKeys.gemini, 'GEMINI_API_KEY'),
                model: models.geminiAnswer,
            });
        case 'openai':
            return new OpenAiAnswerProtocol({
                apiKey: requireKey(apiKeys.openai, 'OPENAI_API_KEY'),
                model: models.openaiAnswer,
            });
    }
}
