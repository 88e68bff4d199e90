// Typed Event Emitter
// node:events with per-event argument types and unsubscribe handles

import { EventEmitter } from 'node:events';
import { logError } from './errors.js';

export type EventMap = Record<string, unknown[]>;

export type Unsubscribe = () => void;

export class TypedEmitter<Events extends EventMap> {
    private readonly emitter = new EventEmitter();

    constructor(private readonly logTag: string) {}

    on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): Unsubscribe {
        this.emitter.on(event, listener);
        return () => {
            this.emitter.off(event, listener);
        };
    }

    /**
     * Listener exceptions are logged so they cannot break the emitting loop
     */
    emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
        try {
            this.emitter.emit(event, ...args);
        } catch (error) {
            logError(error, this.logTag);
        }
    }
}
