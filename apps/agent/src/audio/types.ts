// Audio Types
// Frames handed from the capture sidecar to the live session

import type { AudioFormat } from '@earshot/contracts';

export interface AudioFrame {
    data: Buffer;
    format: AudioFormat;
    /** Sidecar frame sequence number, when the frame came from the sidecar */
    sequence?: number;
}
