// PCM Conversion
// Mono 16-bit PCM at the provider's input rate

import { WIRE_SAMPLE_RATE } from '../transcription/protocols/types.js';
import type { AudioFrame } from './types.js';

const BYTES_PER_SAMPLE = 2;

function clampSample(value: number): number {
    return Math.max(-32768, Math.min(32767, Math.round(value)));
}

/**
 * Average interleaved 16-bit channels into one
 */
export function downmixToMono(data: Buffer, channels: number): Int16Array {
    const frameCount = Math.floor(data.length / (BYTES_PER_SAMPLE * channels));
    const mono = new Int16Array(frameCount);

    for (let i = 0; i < frameCount; i++) {
        let sum = 0;
        for (let c = 0; c < channels; c++) {
            sum += data.readInt16LE((i * channels + c) * BYTES_PER_SAMPLE);
        }
        mono[i] = clampSample(sum / channels);
    }

    return mono;
}

/**
 * Linear-interpolation resampling
 */
export function resampleLinear(samples: Int16Array, fromRate: number, toRate: number): Int16Array {
    if (fromRate === toRate || samples.length === 0) {
        return samples;
    }

    const ratio = fromRate / toRate;
    const outLength = Math.floor((samples.length * toRate) / fromRate);
    const out = new Int16Array(outLength);

    for (let i = 0; i < outLength; i++) {
        const position = i * ratio;
        const index = Math.floor(position);
        const next = Math.min(index + 1, samples.length - 1);
        const fraction = position - index;
        const current = samples[index] ?? 0;
        const following = samples[next] ?? current;
        out[i] = clampSample(current + (following - current) * fraction);
    }

    return out;
}

/**
 * Convert a frame to mono 16-bit PCM at `sampleRate`.
 * Formats other than 16-bit PCM are passed through unchanged.
 */
export function toWirePcm(frame: AudioFrame, sampleRate: number = WIRE_SAMPLE_RATE): Buffer {
    const { format, data } = frame;

    if (format.bitDepth !== 16 || format.channels < 1 || format.sampleRate <= 0) {
        return data;
    }
    if (format.channels === 1 && format.sampleRate === sampleRate) {
        return data;
    }

    const mono = downmixToMono(data, format.channels);
    const resampled = resampleLinear(mono, format.sampleRate, sampleRate);

    const out = Buffer.alloc(resampled.length * BYTES_PER_SAMPLE);
    resampled.forEach((sample, i) => out.writeInt16LE(sample, i * BYTES_PER_SAMPLE));
    return out;
}
