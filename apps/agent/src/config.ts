// Agent Configuration
// Reads and validates the agent's environment (loaded from .env by the entry point)

import type { AnswerProviderName, AudioFormat, LiveProviderName } from '@earshot/contracts';
import { ValidationError } from './utils/errors.js';

export interface ReconnectPolicy {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
}

export interface CaptureConfig {
    /** Capture sidecar executable; null when capture is not configured */
    command: string | null;
    args: string[];
    format: AudioFormat;
}

export interface ApiKeys {
    gemini?: string;
    openai?: string;
    deepgram?: string;
}

export interface ModelOverrides {
    geminiLive?: string;
    geminiAnswer?: string;
    openaiRealtime?: string;
    openaiTranscription?: string;
    openaiAnswer?: string;
    deepgram?: string;
}

export interface AgentConfig {
    port: number;
    liveProvider: LiveProviderName;
    answerProvider: AnswerProviderName;
    apiKeys: ApiKeys;
    models: ModelOverrides;
    setupTimeoutMs: number;
    reconnect: ReconnectPolicy;
    capture: CaptureConfig;
}

type Env = Record<string, string | undefined>;

const LIVE_PROVIDERS: readonly LiveProviderName[] = ['gemini', 'openai', 'deepgram'];
const ANSWER_PROVIDERS: readonly AnswerProviderName[] = ['gemini', 'openai'];

// .env.example ships values like "your_gemini_api_key_here"
const PLACEHOLDER_KEY = /^your_.*_here$/i;

function isLiveProvider(value: string): value is LiveProviderName {
    return LIVE_PROVIDERS.some((provider) => provider === value);
}

function isAnswerProvider(value: string): value is AnswerProviderName {
    return ANSWER_PROVIDERS.some((provider) => provider === value);
}

function readString(env: Env, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

/**
 * An API key counts as configured only when it is set and not a placeholder
 */
export function readApiKey(env: Env, name: string): string | undefined {
    const value = readString(env, name);
    return value && !PLACEHOLDER_KEY.test(value) ? value : undefined;
}

function readInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
    const raw = readString(env, name);
    if (raw === undefined) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ValidationError(`${name} must be an integer between ${min} and ${max}`, {
            name,
            value: raw,
        });
    }
    return value;
}

function readLiveProvider(env: Env): LiveProviderName {
    const raw = readString(env, 'LIVE_PROVIDER')?.toLowerCase() ?? 'gemini';
    if (!isLiveProvider(raw)) {
        throw new ValidationError(`LIVE_PROVIDER must be one of: ${LIVE_PROVIDERS.join(', ')}`, {
            value: raw,
        });
    }
    return raw;
}

function readAnswerProvider(env: Env, liveProvider: LiveProviderName): AnswerProviderName {
    const raw = readString(env, 'ANSWER_PROVIDER')?.toLowerCase();
    if (raw === undefined) {
        // Answer with the live provider when it can, otherwise fall back to Gemini
        return isAnswerProvider(liveProvider) ? liveProvider : 'gemini';
    }
    if (!isAnswerProvider(raw)) {
        throw new ValidationError(`ANSWER_PROVIDER must be one of: ${ANSWER_PROVIDERS.join(', ')}`, {
            value: raw,
        });
    }
    return raw;
}

export function loadConfig(env: Env = process.env): AgentConfig {
    const liveProvider = readLiveProvider(env);
    const answerProvider = readAnswerProvider(env, liveProvider);

    const initialDelayMs = readInteger(env, 'RECONNECT_INITIAL_DELAY_MS', 2000, 0, 600000);
    const maxDelayMs = readInteger(env, 'RECONNECT_MAX_DELAY_MS', 30000, 0, 600000);
    if (maxDelayMs < initialDelayMs) {
        throw new ValidationError('RECONNECT_MAX_DELAY_MS must not be below RECONNECT_INITIAL_DELAY_MS', {
            initialDelayMs,
            maxDelayMs,
        });
    }

    const captureArgs = readString(env, 'CAPTURE_ARGS');

    return {
        port: readInteger(env, 'AGENT_PORT', 3001, 0, 65535),
        liveProvider,
        answerProvider,
        apiKeys: {
            gemini: readApiKey(env, 'GEMINI_API_KEY'),
            openai: readApiKey(env, 'OPENAI_API_KEY'),
            deepgram: readApiKey(env, 'DEEPGRAM_API_KEY'),
        },
        models: {
            geminiLive: readString(env, 'GEMINI_LIVE_MODEL'),
            geminiAnswer: readString(env, 'GEMINI_ANSWER_MODEL'),
            openaiRealtime: readString(env, 'OPENAI_REALTIME_MODEL'),
            openaiTranscription: readString(env, 'OPENAI_TRANSCRIPTION_MODEL'),
            openaiAnswer: readString(env, 'OPENAI_ANSWER_MODEL'),
            deepgram: readString(env, 'DEEPGRAM_MODEL'),
        },
        setupTimeoutMs: readInteger(env, 'SETUP_TIMEOUT_MS', 10000, 1, 600000),
        reconnect: {
            maxAttempts: readInteger(env, 'RECONNECT_MAX_ATTEMPTS', 5, 0, 100),
            initialDelayMs,
            maxDelayMs,
        },
        capture: {
            command: readString(env, 'CAPTURE_COMMAND') ?? null,
            args: captureArgs ? captureArgs.split(/\s+/) : [],
            format: {
                sampleRate: readInteger(env, 'CAPTURE_SAMPLE_RATE', 16000, 8000, 192000),
                bitDepth: readInteger(env, 'CAPTURE_BIT_DEPTH', 16, 8, 32),
                channels: readInteger(env, 'CAPTURE_CHANNELS', 1, 1, 8),
            },
        },
    };
}
