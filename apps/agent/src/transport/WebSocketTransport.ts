// WebSocket Transport
// Persistent full-duplex channel to a live provider, read one message at a time

import WebSocket from 'ws';
import { CancelledError, TransportFailureError } from '../utils/errors.js';
import type { Transport, TransportEndpoint, TransportMessage } from './types.js';

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
const CLOSE_TIMEOUT_MS = 1000;

export interface WebSocketTransportOptions {
    connectTimeoutMs?: number;
}

interface PendingReceive {
    resolve: (message: TransportMessage) => void;
}

function rawDataToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) {
        return data.toString('utf8');
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
}

export class WebSocketTransport implements Transport {
    private ws: WebSocket | null = null;
    private inbox: TransportMessage[] = [];
    private pending = new Set<PendingReceive>();
    private closeMessage: TransportMessage | null = null;
    private lastError: Error | null = null;
    private readonly connectTimeoutMs: number;

    constructor(
        private readonly endpoint: TransportEndpoint,
        options: WebSocketTransportOptions = {}
    ) {
        this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    }

    get isOpen(): boolean {
        return this.ws?.readyState === WebSocket.OPEN;
    }

    async open(signal?: AbortSignal): Promise<void> {
        if (this.ws) {
            throw new TransportFailureError('Transport already opened');
        }
        if (signal?.aborted) {
            throw new CancelledError('Connect aborted');
        }

        const ws = new WebSocket(this.endpoint.url, { headers: this.endpoint.headers });
        this.ws = ws;
        this.setupEventHandlers(ws);

        await new Promise<void>((resolve, reject) => {
            const timeout = setTimeout(() => {
                fail(new TransportFailureError('Connection timeout'));
            }, this.connectTimeoutMs);

            const onOpen = () => {
                cleanup();
                resolve();
            };
            const onError = (error: Error) => {
                fail(new TransportFailureError(error.message, error));
            };
            const onAbort = () => {
                fail(new CancelledError('Connect aborted'));
            };

            const cleanup = () => {
                clearTimeout(timeout);
                ws.off('open', onOpen);
                ws.off('error', onError);
                signal?.removeEventListener('abort', onAbort);
            };

            const fail = (error: Error) => {
                cleanup();
                ws.terminate();
                reject(error);
            };

            ws.once('open', onOpen);
            ws.once('error', onError);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    send(data: string | Buffer): Promise<void> {
        const ws = this.ws;
        if (!ws || ws.readyState !== WebSocket.OPEN) {
            return Promise.reject(new TransportFailureError('WebSocket not open'));
        }

        return new Promise<void>((resolve, reject) => {
            ws.send(data, (error) => {
                if (error) {
                    reject(new TransportFailureError(error.message, error));
                } else {
                    resolve();
                }
            });
        });
    }

    receive(signal?: AbortSignal): Promise<TransportMessage> {
        const next = this.inbox.shift();
        if (next) {
            return Promise.resolve(next);
        }
        if (this.closeMessage) {
            return Promise.resolve(this.closeMessage);
        }
        if (!this.ws) {
            return Promise.reject(new TransportFailureError('Transport is not open'));
        }
        if (signal?.aborted) {
            return Promise.reject(new CancelledError('Receive aborted'));
        }

        return new Promise<TransportMessage>((resolve, reject) => {
            const onAbort = () => {
                this.pending.delete(pending);
                reject(new CancelledError('Receive aborted'));
            };

            const pending: PendingReceive = {
                resolve: (message) => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(message);
                },
            };

            signal?.addEventListener('abort', onAbort, { once: true });
            this.pending.add(pending);
        });
    }

    async close(code: number = 1000, reason: string = 'Client disconnect'): Promise<void> {
        const ws = this.ws;
        if (!ws) {
            return;
        }

        if (ws.readyState === WebSocket.OPEN) {
            // Wait a bit for the close handshake, then drop the socket
            await new Promise<void>((resolve) => {
                const timer = setTimeout(() => {
                    ws.terminate();
                    resolve();
                }, CLOSE_TIMEOUT_MS);

                ws.once('close', () => {
                    clearTimeout(timer);
                    resolve();
                });

                ws.close(code, reason);
            });
        } else if (ws.readyState === WebSocket.CONNECTING) {
            ws.terminate();
        }

        this.markClosed({ type: 'close', code, reason });
    }

    private setupEventHandlers(ws: WebSocket): void {
        ws.on('message', (data: WebSocket.RawData) => {
            this.deliver({ type: 'message', data: rawDataToString(data) });
        });

        ws.on('error', (error: Error) => {
            this.lastError = error;
        });

        ws.on('close', (code: number, reason: Buffer) => {
            this.markClosed({
                type: 'close',
                code,
                reason: reason.toString() || this.lastError?.message || '',
            });
        });
    }

    private deliver(message: TransportMessage): void {
        const [pending] = this.pending;
        if (pending) {
            this.pending.delete(pending);
            pending.resolve(message);
        } else {
            this.inbox.push(message);
        }
    }

    private markClosed(message: TransportMessage): void {
        if (this.closeMessage) {
            return;
        }
        this.closeMessage = message;

        for (const pending of [...this.pending]) {
            this.pending.delete(pending);
            pending.resolve(message);
        }
    }
}

export function createWebSocketTransport(endpoint: TransportEndpoint): Transport {
    return new WebSocketTransport(endpoint);
}
