// HTTP surface: health, session lifecycle routes and the event stream

import type { AddressInfo } from 'node:net';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import { createAgentServer, type AgentServer } from '../src/server.js';
import { ackGeminiSetup, fakeTransportFactory, type FakeTransport } from './helpers/fakeTransport.js';
import { staticFrameSource } from './helpers/frames.js';

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
    return address !== null && typeof address !== 'string';
}

describe('agent server', () => {
    let agent: AgentServer;
    let baseUrl: string;
    let transports: FakeTransport[];
    let holdSetup: boolean;

    beforeEach(async () => {
        holdSetup = false;
        const fake = fakeTransportFactory(() => (holdSetup ? {} : ackGeminiSetup));
        const factory = fake.factory;
        transports = fake.transports;
        agent = createAgentServer(loadConfig({ GEMINI_API_KEY: 'test-key' }), {
            transportFactory: factory,
            frameSource: () => staticFrameSource(),
        });

        await new Promise<void>((resolve) => agent.server.listen(0, '127.0.0.1', () => resolve()));
        const address = agent.server.address();
        if (!isAddressInfo(address)) {
            throw new Error('Expected a TCP address');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await agent.shutdown();
    });

    function post(path: string, body: string): Promise<Response> {
        return fetch(`${baseUrl}${path}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
        });
    }

    it('reports health and provider configuration', async () => {
        const response = await fetch(`${baseUrl}/health`);

        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({
            status: 'ok',
            service: 'earshot-agent',
            liveProvider: 'gemini',
            answerProvider: 'gemini',
            liveProviderConfigured: true,
            answerProviderConfigured: true,
            captureConfigured: false,
            activeSessions: 0,
        });
    });

    it('validates the start request', async () => {
        const missing = await post('/session/start', '{}');
        expect(missing.status).toBe(400);
        expect(await missing.json()).toMatchObject({
            ok: false,
            error: 'Missing or invalid sessionId',
            code: 'VALIDATION_ERROR',
        });

        const invalid = await post('/session/start', 'not json');
        expect(invalid.status).toBe(400);
        expect(await invalid.json()).toMatchObject({ error: 'Invalid JSON body' });
    });

    it('starts, lists and stops a session', async () => {
        const started = await post('/session/start', JSON.stringify({ sessionId: 'session-1' }));
        expect(started.status).toBe(200);
        expect(await started.json()).toMatchObject({
            ok: true,
            sessionId: 'session-1',
            status: { provider: 'gemini', state: 'streaming' },
        });

        const duplicate = await post('/session/start', JSON.stringify({ sessionId: 'session-1' }));
        expect(duplicate.status).toBe(409);
        expect(await duplicate.json()).toMatchObject({ error: 'Session already active', code: 'CONFLICT' });

        const status = await fetch(`${baseUrl}/session/status`);
        expect(await status.json()).toMatchObject({
            ok: true,
            sessions: [{ sessionId: 'session-1', state: 'streaming' }],
        });

        const stopped = await post('/session/stop', JSON.stringify({ sessionId: 'session-1' }));
        expect(await stopped.json()).toEqual({ ok: true, sessionId: 'session-1', questionsAnswered: 0 });
        expect(agent.sessions.has('session-1')).toBe(false);
    });

    it('returns 404 for unknown sessions and routes', async () => {
        const stop = await post('/session/stop', JSON.stringify({ sessionId: 'missing' }));
        expect(stop.status).toBe(404);
        expect(await stop.json()).toMatchObject({ error: "Session with id 'missing' not found", code: 'NOT_FOUND' });

        const events = await fetch(`${baseUrl}/session/missing/events`);
        expect(events.status).toBe(404);

        const unknown = await fetch(`${baseUrl}/nowhere`);
        expect(unknown.status).toBe(404);
        expect(await unknown.json()).toEqual({ ok: false, error: 'Not found' });
    });

    it('streams session events until the session stops', async () => {
        await post('/session/start', JSON.stringify({ sessionId: 'session-1' }));

        const response = await fetch(`${baseUrl}/session/session-1/events`);
        expect(response.headers.get('content-type')).toBe('text/event-stream');
        const body = response.text();

        // The stream is registered before the response headers are sent
        await post('/session/stop', JSON.stringify({ sessionId: 'session-1' }));

        const types = (await body)
            .split('\n\n')
            .filter((block) => block.startsWith('data: '))
            .map((block) => JSON.parse(block.slice('data: '.length)).type);

        expect(types).toEqual(['connection-established', 'session.state', 'session.closed', 'stream-closed']);
    });

    it('streams events of a session that is still connecting', async () => {
        holdSetup = true;
        const started = post('/session/start', JSON.stringify({ sessionId: 'session-2' }));
        await vi.waitFor(() => expect(transports).toHaveLength(1));

        const response = await fetch(`${baseUrl}/session/session-2/events`);
        expect(response.status).toBe(200);
        const body = response.text();

        transports[0]?.deliver(JSON.stringify({ setupComplete: {} }));
        expect((await started).status).toBe(200);
        await post('/session/stop', JSON.stringify({ sessionId: 'session-2' }));

        const events = (await body)
            .split('\n\n')
            .filter((block) => block.startsWith('data: '))
            .map((block) => JSON.parse(block.slice('data: '.length)));

        expect(events.map((event) => event.type)).toEqual([
            'connection-established',
            'session.state',
            'session.state',
            'session.closed',
            'stream-closed',
        ]);
        expect(events[1].payload).toMatchObject({ state: 'streaming', previous: 'awaiting-setup' });
        expect(events[2].payload).toMatchObject({ state: 'closed', previous: 'streaming' });
    });
});
