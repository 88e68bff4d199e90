// Audio Capture Module
// Spawns the configured capture sidecar and reads framed PCM from its stdout

import { spawn, type ChildProcess } from 'node:child_process';
import type { AudioFormat } from '@earshot/contracts';
import { ValidationError } from '../utils/errors.js';
import { readPcmFrames } from './PcmFrameParser.js';
import type { AudioFrame } from './types.js';

const STOP_TIMEOUT_MS = 5000;

export interface CaptureOptions {
    command: string;
    /** `{sessionId}` in an argument is replaced with the session id */
    args: string[];
    format: AudioFormat;
}

export interface CaptureHandle {
    frames: AsyncIterable<AudioFrame>;
    stop: () => Promise<void>;
}

function hasExited(child: ChildProcess): boolean {
    return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Starts the capture sidecar for a session.
 * The returned frames end when the sidecar's stdout closes.
 */
export function startCapture(sessionId: string, options: CaptureOptions): CaptureHandle {
    const args = options.args.map((arg) => arg.replaceAll('{sessionId}', sessionId));

    console.log(`[capture:${sessionId}] Spawning ${options.command} ${args.join(' ')}`);

    const child = spawn(options.command, args, {
        stdio: ['ignore', 'pipe', 'pipe'], // stdout piped for PCM frames
        windowsHide: true,
    });

    if (!child.stdout || !child.stderr) {
        child.kill('SIGKILL');
        throw new ValidationError('Failed to spawn capture sidecar with stdout/stderr pipes', {
            command: options.command,
        });
    }

    // Log stderr (sidecar status messages)
    child.stderr.on('data', (data: Buffer) => {
        const msg = data.toString().trim();
        if (msg) console.log(`[capture:${sessionId}] ${msg}`);
    });

    child.on('exit', (code, signal) => {
        console.log(`[capture:${sessionId}] Sidecar exited: code=${code}, signal=${signal}`);
    });

    child.on('error', (error) => {
        console.error(`[capture:${sessionId}] Sidecar error: ${error.message}`);
    });

    const stop = async (): Promise<void> => {
        if (hasExited(child)) {
            return;
        }

        await new Promise<void>((resolve) => {
            const timeout = setTimeout(() => {
                console.warn(`[capture:${sessionId}] Sidecar didn't exit gracefully, forcing kill`);
                child.kill('SIGKILL');
                resolve();
            }, STOP_TIMEOUT_MS);

            child.once('exit', () => {
                clearTimeout(timeout);
                resolve();
            });

            // SIGINT lets the sidecar flush; falls back to SIGKILL above
            if (!child.kill('SIGINT')) {
                clearTimeout(timeout);
                resolve();
            }
        });
    };

    return {
        frames: readPcmFrames(child.stdout, options.format, `capture:${sessionId}`),
        stop,
    };
}
