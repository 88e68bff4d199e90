// Question Detector
// Extracts the trailing question from a completed transcript turn
// and tracks which questions were already answered in a recording session

/**
 * QuestionDetector - punctuation-based question extraction
 *
 * Rules:
 * - The turn must contain a '?'
 * - The last line containing a '?' is kept, cut after its last '?'
 * - Only the final sentence of that line is the question
 * - Questions shorter than MIN_LENGTH characters are ignored
 */
export class QuestionDetector {
    static readonly MIN_LENGTH = 3;

    // A sentence ends at '.', '!' or '?' followed by whitespace
    private static readonly SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

    /**
     * Extract the question from a finalized turn, or null when there is none
     */
    static extract(turn: string): string | null {
        if (!turn.includes('?')) {
            return null;
        }

        const questionLines = turn.split(/\r?\n/).filter((line) => line.includes('?'));
        const lastLine = questionLines[questionLines.length - 1];
        if (lastLine === undefined) {
            return null;
        }

        const truncated = lastLine.slice(0, lastLine.lastIndexOf('?') + 1);
        const sentences = truncated.split(this.SENTENCE_BOUNDARY);
        const question = (sentences[sentences.length - 1] ?? '').trim();

        return question.length >= this.MIN_LENGTH ? question : null;
    }

    /**
     * Key used for de-duplication: case-insensitive, whitespace-collapsed
     */
    static normalize(question: string): string {
        return question.trim().replace(/\s+/g, ' ').toLowerCase();
    }
}

/**
 * Questions already dispatched for answering in the current recording session
 */
export class AnsweredQuestionSet {
    private readonly seen = new Set<string>();

    get size(): number {
        return this.seen.size;
    }

    has(question: string): boolean {
        return this.seen.has(QuestionDetector.normalize(question));
    }

    /**
     * Record the question; true when it was not seen before
     */
    testAndAdd(question: string): boolean {
        const key = QuestionDetector.normalize(question);
        if (this.seen.has(key)) {
            return false;
        }
        this.seen.add(key);
        return true;
    }

    clear(): void {
        this.seen.clear();
    }
}
