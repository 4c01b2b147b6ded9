import { logThought } from '../utils/logger.js';
import type { WsHub } from './websocket-hub.js';
import type { WsEventTopic } from '../types/websocket.js';
import type { BackendFamily, BackendRegistryEvent } from '../types/backends.js';
import type { ProgressListener, QueueStats, RequestSnapshot } from '../types/orchestration.js';
import type { BackendRegistryView } from './handlers/health.js';

export interface RuntimeEventBridgeDeps {
    hub: WsHub;
    queue: {
        subscribe(listener: ProgressListener): () => void;
        stats(): QueueStats;
        list(filter?: { status?: RequestSnapshot['status'] }): RequestSnapshot[];
    };
    registries: Record<BackendFamily, BackendRegistryView & {
        subscribe(listener: (event: BackendRegistryEvent) => void): () => void;
    }>;
}

/**
 * Forwards queue progress and registry changes to the WebSocket hub as they happen, and answers
 * new subscriptions with a snapshot of current state.
 */
export class RuntimeEventBridge {
    readonly #deps: RuntimeEventBridgeDeps;
    #unsubscribers: Array<() => void> = [];

    constructor(deps: RuntimeEventBridgeDeps) {
        this.#deps = deps;
        this.#deps.hub.onSubscribe = (clientId, topics) => {
            this.#dispatchSnapshotTo(clientId, topics);
        };
    }

    start(): void {
        if (this.#unsubscribers.length > 0) return;
        const { hub, queue, registries } = this.#deps;

        this.#unsubscribers = [
            queue.subscribe((event) => {
                hub.publish('requests', event, { requestId: event.requestId });
            }),
            registries.transcription.subscribe((event) => hub.publish('backends', event)),
            registries.synthesis.subscribe((event) => hub.publish('backends', event)),
        ];
        void logThought('[RuntimeEventBridge] Forwarding queue and backend events.');
    }

    stop(): void {
        for (const unsubscribe of this.#unsubscribers) {
            unsubscribe();
        }
        this.#unsubscribers = [];
        void logThought('[RuntimeEventBridge] Stopped.');
    }

    /** Current state keyed by topic; every topic when `topics` is empty. */
    collectSnapshot(topics: WsEventTopic[] = []): Record<string, unknown> {
        const include = (topic: WsEventTopic): boolean => topics.length === 0 || topics.includes(topic);
        const snapshot: Record<string, unknown> = {};
        const { queue, registries } = this.#deps;

        if (include('requests')) {
            snapshot.requests = {
                stats: queue.stats(),
                active: [...queue.list({ status: 'running' }), ...queue.list({ status: 'queued' })],
            };
        }
        if (include('backends')) {
            snapshot.backends = {
                transcription: { selectedId: registries.transcription.selectedId(), backends: registries.transcription.list() },
                synthesis: { selectedId: registries.synthesis.selectedId(), backends: registries.synthesis.list() },
            };
        }
        return snapshot;
    }

    #dispatchSnapshotTo(clientId: string, topics: WsEventTopic[]): void {
        this.#deps.hub.sendSnapshotTo(clientId, this.collectSnapshot(topics));
    }
}
