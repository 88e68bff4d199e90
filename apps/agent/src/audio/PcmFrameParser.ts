// PCM Frame Parser
// Parses framed PCM data from the capture sidecar's stdout
//
// Frame layout (little-endian):
//   [0..4)   magic "EARS"
//   [4..8)   uint32 sequence number
//   [8..12)  uint32 payload size in bytes
//   [12..)   PCM payload

import type { Readable } from 'node:stream';
import type { AudioFormat } from '@earshot/contracts';
import type { AudioFrame } from './types.js';

export const FRAME_MAGIC = Buffer.from('EARS');
export const FRAME_HEADER_SIZE = 12;
/** Larger sizes can only come from a corrupted header */
export const MAX_FRAME_PAYLOAD = 1024 * 1024;

export interface PcmFrame {
    sequence: number;
    data: Buffer;
}

export class PcmFrameParser {
    private buffer: Buffer = Buffer.alloc(0);
    private lastSequence = -1;
    private frameCount = 0;
    private droppedBytes = 0;

    constructor(private readonly logTag: string = 'pcm') {}

    get framesParsed(): number {
        return this.frameCount;
    }

    get bytesSkipped(): number {
        return this.droppedBytes;
    }

    /**
     * Feed a stdout chunk; returns every frame it completed
     */
    push(chunk: Buffer): PcmFrame[] {
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
        const frames: PcmFrame[] = [];

        while (this.buffer.length >= FRAME_HEADER_SIZE) {
            if (!this.buffer.subarray(0, FRAME_MAGIC.length).equals(FRAME_MAGIC)) {
                this.resync();
                continue;
            }

            const sequence = this.buffer.readUInt32LE(4);
            const frameSize = this.buffer.readUInt32LE(8);
            if (frameSize > MAX_FRAME_PAYLOAD) {
                console.warn(`[${this.logTag}] Frame size ${frameSize} exceeds ${MAX_FRAME_PAYLOAD} bytes`);
                this.resync();
                continue;
            }
            const totalSize = FRAME_HEADER_SIZE + frameSize;

            if (this.buffer.length < totalSize) {
                break; // Wait for more data
            }

            if (this.lastSequence >= 0 && sequence !== (this.lastSequence + 1) % 0x100000000) {
                console.warn(`[${this.logTag}] Frame gap: expected ${this.lastSequence + 1}, got ${sequence}`);
            }
            this.lastSequence = sequence;
            this.frameCount++;

            frames.push({ sequence, data: this.buffer.subarray(FRAME_HEADER_SIZE, totalSize) });
            this.buffer = this.buffer.subarray(totalSize);
        }

        return frames;
    }

    reset(): void {
        this.buffer = Buffer.alloc(0);
        this.lastSequence = -1;
    }

    // Lost frame sync: skip to the next magic, keeping a tail that may start one
    private resync(): void {
        const magicIndex = this.buffer.indexOf(FRAME_MAGIC, 1);
        const skip = magicIndex > 0
            ? magicIndex
            : Math.max(1, this.buffer.length - (FRAME_MAGIC.length - 1));

        console.warn(`[${this.logTag}] Lost sync, skipping ${skip} bytes`);
        this.droppedBytes += skip;
        this.buffer = this.buffer.subarray(skip);
    }
}

/**
 * Audio frames read from a framed PCM stream until it ends
 */
export async function* readPcmFrames(
    stream: Readable,
    format: AudioFormat,
    logTag?: string
): AsyncGenerator<AudioFrame> {
    const parser = new PcmFrameParser(logTag);

    for await (const chunk of stream) {
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        for (const frame of parser.push(data)) {
            yield { data: frame.data, format, sequence: frame.sequence };
        }
    }
}
