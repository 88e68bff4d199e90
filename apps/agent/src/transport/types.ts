// Transport Types
// Contract for the single full-duplex message channel a live session owns

export interface TransportEndpoint {
    url: string;
    headers?: Record<string, string>;
}

export type TransportMessage =
    | { type: 'message'; data: string }
    | { type: 'close'; code: number; reason: string };

export interface Transport {
    readonly isOpen: boolean;
    open(signal?: AbortSignal): Promise<void>;
    send(data: string | Buffer): Promise<void>;
    /** Next inbound message in arrival order; a `close` message once the channel has closed. */
    receive(signal?: AbortSignal): Promise<TransportMessage>;
    close(code?: number, reason?: string): Promise<void>;
}

export type TransportFactory = (endpoint: TransportEndpoint) => Transport;
