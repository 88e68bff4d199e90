// WebSocket transport against an in-process server

import type { IncomingHttpHeaders } from 'node:http';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { WebSocketServer } from 'ws';
import { WebSocketTransport } from '../src/transport/WebSocketTransport.js';
import { CancelledError, TransportFailureError } from '../src/utils/errors.js';

interface ServerClose {
    code: number;
    reason: string;
}

async function listen(server: WebSocketServer): Promise<number> {
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Expected a TCP address');
    }
    return address.port;
}

async function shutdown(server: WebSocketServer): Promise<void> {
    for (const client of server.clients) {
        client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
}

describe('WebSocketTransport', () => {
    let server: WebSocketServer;
    let url: string;
    let headers: IncomingHttpHeaders[];
    let serverCloses: ServerClose[];

    beforeEach(async () => {
        headers = [];
        serverCloses = [];
        server = new WebSocketServer({ port: 0 });
        server.on('connection', (socket, request) => {
            headers.push(request.headers);
            socket.on('message', (data) => {
                const text = data.toString();
                if (text === 'close-me') {
                    socket.close(4000, 'bye');
                } else {
                    socket.send(`echo:${text}`);
                }
            });
            socket.on('close', (code, reason) => {
                serverCloses.push({ code, reason: reason.toString() });
            });
        });
        url = `ws://127.0.0.1:${await listen(server)}`;
    });

    afterEach(async () => {
        await shutdown(server);
    });

    it('sends headers and exchanges messages in order', async () => {
        const transport = new WebSocketTransport({ url, headers: { Authorization: 'Token test-key' } });
        await transport.open();

        expect(transport.isOpen).toBe(true);
        expect(headers[0]?.authorization).toBe('Token test-key');

        await transport.send('one');
        await transport.send('two');

        await expect(transport.receive()).resolves.toEqual({ type: 'message', data: 'echo:one' });
        await expect(transport.receive()).resolves.toEqual({ type: 'message', data: 'echo:two' });
        await transport.close();
    });

    it('reports a server close and keeps reporting it', async () => {
        const transport = new WebSocketTransport({ url });
        await transport.open();

        await transport.send('close-me');

        const closed = { type: 'close', code: 4000, reason: 'bye' };
        await expect(transport.receive()).resolves.toEqual(closed);
        await expect(transport.receive()).resolves.toEqual(closed);
        expect(transport.isOpen).toBe(false);
        await expect(transport.send('late')).rejects.toBeInstanceOf(TransportFailureError);
    });

    it('performs the close handshake with the given code and reason', async () => {
        const transport = new WebSocketTransport({ url });
        await transport.open();

        await transport.close(1000, 'Client disconnecting');

        await vi.waitFor(() => expect(serverCloses).toEqual([{ code: 1000, reason: 'Client disconnecting' }]));
        await expect(transport.receive()).resolves.toMatchObject({ type: 'close', code: 1000 });
    });

    it('cancels a pending receive', async () => {
        const transport = new WebSocketTransport({ url });
        await transport.open();
        const controller = new AbortController();

        const receive = transport.receive(controller.signal);
        controller.abort();

        await expect(receive).rejects.toBeInstanceOf(CancelledError);
        await transport.close();
    });

    it('rejects sends before open', async () => {
        const transport = new WebSocketTransport({ url });

        await expect(transport.send('early')).rejects.toThrow('Transport failure: WebSocket not open');
    });

    it('fails to open when nothing is listening', async () => {
        const unused = new WebSocketServer({ port: 0 });
        const port = await listen(unused);
        await shutdown(unused);

        const transport = new WebSocketTransport({ url: `ws://127.0.0.1:${port}` });

        await expect(transport.open()).rejects.toBeInstanceOf(TransportFailureError);
    });

    it('does not connect once aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const transport = new WebSocketTransport({ url });

        await expect(transport.open(controller.signal)).rejects.toBeInstanceOf(CancelledError);
        expect(headers).toEqual([]);
    });
});
