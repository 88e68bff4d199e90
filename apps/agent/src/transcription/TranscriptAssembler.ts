// Transcript Assembler
// Turn accumulation and overlap-resolving display deltas for providers that resend growing text

/**
 * Text of the turn in progress. Only touched through these methods,
 * each of which runs to completion before any other event is handled.
 */
export class TurnBuffer {
    private text = '';

    get length(): number {
        return this.text.length;
    }

    append(chunk: string): void {
        this.text += chunk;
    }

    /** Append a finished segment, separated from the previous one by a space */
    appendSegment(segment: string): void {
        const text = segment.trim();
        if (text.length === 0) {
            return;
        }
        if (this.text.length > 0 && !/\s$/.test(this.text)) {
            this.text += ' ';
        }
        this.text += text;
    }

    /** Trimmed turn text; the buffer is empty afterwards */
    drainAndClear(): string {
        const turn = this.text.trim();
        this.text = '';
        return turn;
    }

    clear(): void {
        this.text = '';
    }
}

/**
 * Running text P built from successive full snapshots N.
 * P never shrinks; merge() returns the part of N not already in P, or null.
 */
export class OverlapMerger {
    private previous = '';

    get text(): string {
        return this.previous;
    }

    merge(next: string): string | null {
        if (next.length === 0) {
            return null;
        }

        const prev = this.previous;
        const prevLower = prev.toLowerCase();
        const nextLower = next.toLowerCase();

        if (nextLower === prevLower) {
            return null;
        }

        if (nextLower.startsWith(prevLower)) {
            const delta = next.slice(prev.length);
            this.previous = next;
            return delta;
        }

        if (prevLower.startsWith(nextLower)) {
            return null;
        }

        // Longest suffix of P that is a prefix of N
        for (let k = Math.min(prev.length, next.length); k >= 1; k--) {
            if (prevLower.endsWith(nextLower.slice(0, k))) {
                const delta = next.slice(k);
                if (delta.length === 0) {
                    return null;
                }
                this.previous = prev + delta;
                return delta;
            }
        }

        if (prevLower.includes(nextLower)) {
            return null;
        }

        const delta = `\n${next}`;
        this.previous = prev + delta;
        return delta;
    }

    reset(): void {
        this.previous = '';
    }
}

export class TranscriptAssembler {
    private readonly turn = new TurnBuffer();
    private readonly rolling = new OverlapMerger();

    /** Running display text built from snapshots; lives for the whole session */
    get rollingText(): string {
        return this.rolling.text;
    }

    /**
     * Feed one incremental delta. It is appended to the turn and shown as is;
     * returns null for an empty delta.
     */
    ingest(text: string): string | null {
        if (text.length === 0) {
            return null;
        }
        this.turn.append(text);
        return text;
    }

    /**
     * Feed one snapshot of the segment in progress. Returns the display delta
     * from the rolling view, or null. Only a final snapshot joins the turn,
     * so revised interim wording never reaches it.
     */
    ingestSnapshot(text: string, final: boolean): string | null {
        if (final) {
            this.turn.appendSegment(text);
        }
        return this.rolling.merge(text);
    }

    /**
     * Close the current turn. A provider-supplied final transcript wins over
     * the accumulated text; the buffer is cleared either way.
     */
    completeTurn(finalTranscript?: string): string {
        const buffered = this.turn.drainAndClear();
        return finalTranscript !== undefined ? finalTranscript.trim() : buffered;
    }

    /** Drop mid-turn text, e.g. before a reconnect attempt */
    resetTurn(): void {
        this.turn.clear();
    }

    reset(): void {
        this.turn.clear();
        this.rolling.reset();
    }
}
