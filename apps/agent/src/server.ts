// Local Agent - HTTP Server
// Exposes endpoints for live session control and event streaming
//
// Endpoints:
//   POST /session/start        - Start a live session
//   POST /session/stop         - Stop a live session
//   GET  /session/status       - Status of active sessions
//   GET  /session/:id/events   - Session events as Server-Sent Events
//   GET  /health               - Health check

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type {
    SessionStatusResponse,
    StartSessionResponse,
    StopSessionResponse,
} from '@earshot/contracts';
import type { AgentConfig } from './config.js';
import { SSEConnectionManager, formatSSEEvent } from './sse/ConnectionManager.js';
import { SessionManager, type SessionManagerDeps } from './session/SessionManager.js';
import { isRecord } from './transcription/protocols/json.js';
import { NotFoundError, ValidationError, formatErrorResponse, logError } from './utils/errors.js';

const SERVICE_NAME = 'earshot-agent';
const SERVICE_VERSION = '0.1.0';

export interface AgentServer {
    server: Server;
    sessions: SessionManager;
    sse: SSEConnectionManager;
    /** Stop every session, then close the HTTP server */
    shutdown: () => Promise<void>;
}

/**
 * Parse JSON body from request
 */
async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        let body = '';
        req.on('data', (chunk: Buffer) => {
            body += chunk.toString();
        });
        req.on('end', () => {
            try {
                resolve(body ? JSON.parse(body) : {});
            } catch {
                reject(new ValidationError('Invalid JSON body'));
            }
        });
        req.on('error', reject);
    });
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
}

function sendError(res: ServerResponse, error: unknown): void {
    const body = formatErrorResponse(error);
    sendJson(res, body.statusCode, body);
}

function readSessionId(body: unknown): string {
    const sessionId = isRecord(body) ? body.sessionId : undefined;
    if (typeof sessionId !== 'string' || sessionId.trim().length === 0) {
        throw new ValidationError('Missing or invalid sessionId');
    }
    return sessionId;
}

export function createAgentServer(config: AgentConfig, deps: SessionManagerDeps = {}): AgentServer {
    const sse = new SSEConnectionManager();
    const sessions = new SessionManager(config, sse, deps);

    /**
     * Handle POST /session/start
     */
    async function handleSessionStart(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const sessionId = readSessionId(await parseJsonBody(req));
        const status = await sessions.start(sessionId);

        const response: StartSessionResponse = { ok: true, sessionId, status };
        sendJson(res, 200, response);
    }

    /**
     * Handle POST /session/stop
     */
    async function handleSessionStop(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const body = await parseJsonBody(req);
        const sessionId = readSessionId(body);
        const cancelAnswers = isRecord(body) && body.cancelAnswers === true;

        const questionsAnswered = await sessions.stop(sessionId, cancelAnswers);

        const response: StopSessionResponse = { ok: true, sessionId, questionsAnswered };
        sendJson(res, 200, response);
    }

    /**
     * Handle GET /session/status
     */
    function handleSessionStatus(res: ServerResponse): void {
        const response: SessionStatusResponse = { ok: true, sessions: sessions.list() };
        sendJson(res, 200, response);
    }

    /**
     * Handle GET /health
     */
    function handleHealth(res: ServerResponse): void {
        const keys = config.apiKeys;
        sendJson(res, 200, {
            status: 'ok',
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            platform: process.platform,
            liveProvider: config.liveProvider,
            answerProvider: config.answerProvider,
            liveProviderConfigured: keys[config.liveProvider] !== undefined,
            answerProviderConfigured: keys[config.answerProvider] !== undefined,
            captureConfigured: config.capture.command !== null,
            activeSessions: sessions.list().length,
            timestamp: new Date().toISOString(),
        });
    }

    /**
     * Handle GET /session/:sessionId/events
     * Stream session events as Server-Sent Events
     */
    function handleSessionEvents(sessionId: string, req: IncomingMessage, res: ServerResponse): void {
        if (!sessions.has(sessionId)) {
            console.warn(`[sse] Session ${sessionId} not found in active sessions. Client will retry.`);
            throw new NotFoundError('Session', sessionId);
        }

        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive',
        });

        res.write(formatSSEEvent({
            type: 'connection-established',
            sessionId,
            timestamp: Date.now(),
        }));

        const unsubscribe = sse.registerClient(sessionId, res);

        req.on('close', unsubscribe);
        req.on('error', (err) => {
            console.error(`[sse] Request error for ${sessionId}:`, err.message);
            unsubscribe();
        });
    }

    /**
     * Main request handler
     */
    async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const url = req.url ?? '/';
        const method = req.method ?? 'GET';

        console.log(`[agent] ${method} ${url}`);

        // CORS headers for local clients
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        if (url === '/session/start' && method === 'POST') {
            await handleSessionStart(req, res);
        } else if (url === '/session/stop' && method === 'POST') {
            await handleSessionStop(req, res);
        } else if (url === '/session/status' && method === 'GET') {
            handleSessionStatus(res);
        } else if (url === '/health' && method === 'GET') {
            handleHealth(res);
        } else {
            const eventsMatch = url.match(/^\/session\/([^/]+)\/events$/);
            const sessionId = eventsMatch?.[1];
            if (sessionId !== undefined && method === 'GET') {
                handleSessionEvents(decodeURIComponent(sessionId), req, res);
            } else {
                sendJson(res, 404, { ok: false, error: 'Not found' });
            }
        }
    }

    const server = createServer((req, res) => {
        handleRequest(req, res).catch((error: unknown) => {
            logError(error, 'agent');
            if (!res.headersSent) {
                sendError(res, error);
            } else {
                res.end();
            }
        });
    });

    const shutdown = async (): Promise<void> => {
        await sessions.stopAll();
        sse.closeAll();
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
    };

    return { server, sessions, sse, shutdown };
}

/**
 * Start the HTTP server
 */
export function startServer(config: AgentConfig): AgentServer {
    const agent = createAgentServer(config);

    const onSignal = (signal: NodeJS.Signals) => {
        console.log(`\n[agent] Received ${signal}, shutting down...`);
        agent.shutdown()
            .then(() => {
                console.log('[agent] Server closed');
                process.exit(0);
            })
            .catch((error: unknown) => {
                logError(error, 'agent');
                process.exit(1);
            });
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    agent.server.listen(config.port, () => {
        console.log(`[agent] Server listening on port ${config.port}`);
        console.log(`[agent] Live provider: ${config.liveProvider}, answers: ${config.answerProvider}`);
        console.log(`[agent] Capture configured: ${config.capture.command !== null}`);
    });

    return agent;
}
