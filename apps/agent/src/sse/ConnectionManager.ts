// SSE Connection Manager
// Manages Server-Sent Events connections streaming session events to clients

import type { ServerResponse } from 'node:http';
import type { SessionEvent } from '@earshot/contracts';

interface SSEClient {
    response: ServerResponse;
    connectedAt: number;
}

/**
 * Events written on the stream besides the session's own
 */
export type StreamControlEvent =
    | { type: 'connection-established'; sessionId: string; timestamp: number }
    | { type: 'stream-closed'; sessionId: string; timestamp: number };

export type StreamEvent = SessionEvent | StreamControlEvent;

export class SSEConnectionManager {
    // Map<sessionId, Set<SSEClient>>
    private connections: Map<string, Set<SSEClient>> = new Map();

    /**
     * Register a new SSE client for a session
     * @returns unsubscribe function to remove client on disconnect
     */
    registerClient(sessionId: string, response: ServerResponse): () => void {
        let clients = this.connections.get(sessionId);
        if (!clients) {
            clients = new Set();
            this.connections.set(sessionId, clients);
        }

        const client: SSEClient = {
            response,
            connectedAt: Date.now(),
        };
        clients.add(client);

        console.log(`[sse] Client connected for session ${sessionId}. Total clients: ${clients.size}`);

        response.on('close', () => {
            this.removeClient(sessionId, client);
        });

        response.on('error', (error) => {
            console.error(`[sse] Client error for ${sessionId}:`, error.message);
            this.removeClient(sessionId, client);
        });

        return () => this.removeClient(sessionId, client);
    }

    private removeClient(sessionId: string, client: SSEClient): void {
        const clients = this.connections.get(sessionId);
        if (!clients || !clients.delete(client)) {
            return;
        }

        console.log(`[sse] Client disconnected for session ${sessionId}. Remaining clients: ${clients.size}`);
        if (clients.size === 0) {
            this.connections.delete(sessionId);
        }
    }

    /**
     * Broadcast an event to all connected clients for a session
     */
    broadcast(sessionId: string, event: StreamEvent): void {
        const clients = this.connections.get(sessionId);
        if (!clients || clients.size === 0) {
            return;
        }

        const sseData = formatSSEEvent(event);
        let failCount = 0;

        clients.forEach((client) => {
            try {
                client.response.write(sseData);
            } catch (err) {
                // Client disconnected, will be cleaned up on its close event
                console.error(`[sse] Error writing to client for ${sessionId}:`, err);
                failCount++;
            }
        });

        if (failCount > 0) {
            console.warn(`[sse] Failed to send ${event.type} to ${failCount}/${clients.size} clients for ${sessionId}`);
        }
    }

    /**
     * Close all connections for a session (when the session stops)
     */
    closeSessionConnections(sessionId: string): void {
        const clients = this.connections.get(sessionId);
        if (!clients) {
            return;
        }

        const closeData = formatSSEEvent({
            type: 'stream-closed',
            sessionId,
            timestamp: Date.now(),
        });

        console.log(`[sse] Closing ${clients.size} connections for session ${sessionId}`);

        clients.forEach((client) => {
            if (client.response.writableEnded) {
                return;
            }
            client.response.write(closeData);
            client.response.end();
        });

        this.connections.delete(sessionId);
    }

    closeAll(): void {
        for (const sessionId of [...this.connections.keys()]) {
            this.closeSessionConnections(sessionId);
        }
    }
}

/**
 * Format event as SSE: data: {json}\n\n
 */
export function formatSSEEvent(event: StreamEvent): string {
    return `data: ${JSON.stringify(event)}\n\n`;
}
