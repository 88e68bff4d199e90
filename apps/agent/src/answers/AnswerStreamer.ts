// Answer Streamer
// One-shot server-streamed (SSE) answer request, independent of the live connection

import type { AnswerProtocol } from '../transcription/protocols/types.js';
import { ExternalServiceError, getErrorMessage, logError } from '../utils/errors.js';

export type FetchFn = typeof fetch;

export interface AnswerSource {
    stream(question: string, onChunk: (text: string) => void, signal?: AbortSignal): Promise<string>;
}

export interface AnswerStreamerOptions {
    fetchImpl?: FetchFn;
}

const SSE_DATA_PREFIX = 'data:';
const SSE_DONE = '[DONE]';

export class AnswerStreamer implements AnswerSource {
    private readonly fetchImpl: FetchFn;

    constructor(
        private readonly protocol: AnswerProtocol,
        options: AnswerStreamerOptions = {}
    ) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    get provider(): string {
        return this.protocol.name;
    }

    /**
     * Stream the answer to `question`, forwarding each text chunk as it arrives.
     * Resolves with the full answer; an abort resolves with whatever arrived so far.
     */
    async stream(
        question: string,
        onChunk: (text: string) => void,
        signal?: AbortSignal
    ): Promise<string> {
        const request = this.protocol.encodeAnswerRequest(question);
        let answer = '';

        let response: Response;
        try {
            response = await this.fetchImpl(request.url, {
                method: 'POST',
                headers: request.headers,
                body: request.body,
                signal,
            });
        } catch (error) {
            if (signal?.aborted) {
                return answer;
            }
            throw new ExternalServiceError(
                this.protocol.name,
                `Answer request failed: ${getErrorMessage(error)}`,
                error instanceof Error ? error : undefined
            );
        }

        if (!response.ok) {
            const body = await response.text();
            throw new ExternalServiceError(
                this.protocol.name,
                `Answer request failed with status ${response.status}: ${body}`
            );
        }

        if (!response.body) {
            return answer;
        }

        const reader = response.body.getReader();
        const decoder = new TextDecoder();
        let pending = '';

        // Returns true once the terminator line has been seen
        const handleLine = (rawLine: string): boolean => {
            const line = rawLine.trim();
            if (!line.startsWith(SSE_DATA_PREFIX)) {
                return false;
            }

            const data = line.slice(SSE_DATA_PREFIX.length).trim();
            if (data === SSE_DONE) {
                return true;
            }

            const chunk = this.protocol.decodeAnswerData(data);
            if (chunk) {
                answer += chunk;
                onChunk(chunk);
            }
            return false;
        };

        try {
            let terminated = false;
            while (!terminated) {
                const result = await reader.read();
                if (result.done) {
                    handleLine(pending + decoder.decode());
                    return answer;
                }

                pending += decoder.decode(result.value, { stream: true });
                const lines = pending.split('\n');
                pending = lines.pop() ?? '';
                terminated = lines.some(handleLine);
            }
        } catch (error) {
            if (signal?.aborted) {
                return answer;
            }
            throw new ExternalServiceError(
                this.protocol.name,
                `Answer stream failed: ${getErrorMessage(error)}`,
                error instanceof Error ? error : undefined
            );
        }

        // Terminator seen before the body ended
        reader.cancel().catch((error: unknown) => logError(error, 'answers'));

        return answer;
    }
}
