// Session registry: pending registration, conflicts and sessions that die on their own

import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import { SessionManager } from '../src/session/SessionManager.js';
import { SSEConnectionManager } from '../src/sse/ConnectionManager.js';
import { ConflictError, TransportFailureError } from '../src/utils/errors.js';
import { ackGeminiSetup, fakeTransportFactory, type FakeTransportBehavior } from './helpers/fakeTransport.js';
import { staticFrameSource } from './helpers/frames.js';

const refused: FakeTransportBehavior = { failOpen: new TransportFailureError('connection refused') };

function createManager(configure: (index: number) => FakeTransportBehavior) {
    const { factory, transports } = fakeTransportFactory(configure);
    const source = staticFrameSource();
    const sse = new SSEConnectionManager();
    const closeConnections = vi.spyOn(sse, 'closeSessionConnections');
    const manager = new SessionManager(loadConfig({ GEMINI_API_KEY: 'test-key' }), sse, {
        transportFactory: factory,
        frameSource: () => source,
        delay: async () => {},
    });
    return { manager, transports, source, closeConnections };
}

describe('SessionManager', () => {
    it('registers a session while it is still connecting', async () => {
        const { manager, transports } = createManager(() => ({}));

        const started = manager.start('session-1');
        await vi.waitFor(() => expect(transports).toHaveLength(1));

        expect(manager.has('session-1')).toBe(true);
        await expect(manager.start('session-1')).rejects.toBeInstanceOf(ConflictError);

        transports[0]?.deliver(JSON.stringify({ setupComplete: {} }));
        await expect(started).resolves.toMatchObject({ sessionId: 'session-1', state: 'streaming' });
        await manager.stop('session-1');
    });

    it('forgets a session that never connects', async () => {
        const { manager, closeConnections } = createManager(() => refused);

        await expect(manager.start('session-1')).rejects.toThrow('Transport failure: connection refused');

        expect(manager.has('session-1')).toBe(false);
        expect(closeConnections).toHaveBeenCalledWith('session-1');
    });

    it('drops a session whose reconnects run out and stops its capture', async () => {
        const { manager, transports, source, closeConnections } = createManager((index) => (
            index === 0 ? ackGeminiSetup : refused
        ));
        await manager.start('session-1');

        transports[0]?.serverClose();

        await vi.waitFor(() => expect(manager.has('session-1')).toBe(false));
        expect(source.stopped()).toBe(true);
        expect(closeConnections).toHaveBeenCalledWith('session-1');
        expect(manager.list()).toEqual([]);
    });
});
