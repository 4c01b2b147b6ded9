import type { IncomingMessage, Server } from 'node:http';
import { randomUUID, timingSafeEqual } from 'node:crypto';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { logThought } from '../utils/logger.js';
import type { RequestInput, RequestSnapshot } from '../types/orchestration.js';
import type { WsEventTopic, WsHubMetrics } from '../types/websocket.js';
import { WsCloseCode, WsErrorCode } from '../types/websocket.js';
import { parseRequestInput } from './handlers/requests.js';
import { mapError } from './shared.js';

// ── Constants ──────────────────────────────────────────────────────────────────

const DEFAULT_AUTH_TIMEOUT_MS = 5_000;
const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
/** Default backpressure threshold in kilobytes (see WsHubConfig.maxClientQueue). */
const DEFAULT_MAX_CLIENT_QUEUE = 200;

const VALID_TOPICS: ReadonlySet<string> = new Set<WsEventTopic>(['requests', 'backends']);

function isTopic(value: unknown): value is WsEventTopic {
    return typeof value === 'string' && VALID_TOPICS.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeFrame(data: RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    return (data instanceof ArrayBuffer ? Buffer.from(data) : data).toString('utf8');
}

function tokensMatch(provided: string, expected: string): boolean {
    const left = Buffer.from(provided);
    const right = Buffer.from(expected);
    return left.length === right.length && timingSafeEqual(left, right);
}

// ── Internal Client State ──────────────────────────────────────────────────────

interface ClientState {
    id: string;
    ws: WebSocket;
    authenticated: boolean;
    subscriptions: Set<WsEventTopic>;
    /** Narrows `requests` events; `null` means every request. */
    requestFilter: Set<string> | null;
    authTimer: ReturnType<typeof setTimeout> | null;
    isAlive: boolean;
    connectedAt: number;
}

// ── Config ─────────────────────────────────────────────────────────────────────

/** What clients may ask the runtime to do over the socket. */
export interface WsRequestCommands {
    submit(input: RequestInput): RequestSnapshot;
    cancel(requestId: string, reason?: string): boolean;
}

export interface WsHubConfig {
    /** Shared secret expected in the `auth` message. Empty rejects every client. */
    apiSecret: string;
    commands?: WsRequestCommands;
    authTimeoutMs?: number;
    heartbeatIntervalMs?: number;
    /**
     * Per-client backpressure threshold in kilobytes. Events for a client whose
     * `ws.bufferedAmount` exceeds `maxClientQueue * 1024` bytes are dropped.
     */
    maxClientQueue?: number;
}

export interface PublishOptions {
    /** Deliver only to clients whose request filter admits this id. */
    requestId?: string;
}

// ── WsHub ──────────────────────────────────────────────────────────────────────

/**
 * WebSocket hub for runtime events.
 *
 * Clients authenticate with the shared secret, subscribe to `requests` and/or `backends`
 * (optionally narrowed to specific request ids), and may `submit` or `cancel` requests.
 * Every event goes out in a versioned envelope with a hub-wide monotonic `seq`.
 */
export class WsHub {
    readonly #config: Required<Omit<WsHubConfig, 'commands'>>;
    readonly #commands: WsRequestCommands | null;
    readonly #clients: Map<string, ClientState> = new Map();
    #wss: WebSocketServer | null = null;
    #heartbeatTimer: ReturnType<typeof setInterval> | null = null;
    #seq = 0;

    #metrics: Omit<WsHubMetrics, 'activeClients'> = {
        totalConnections: 0,
        authFailures: 0,
        droppedEvents: 0,
        staleCleaned: 0,
        lastEventAt: null,
    };

    /**
     * Called when a client subscribes. The event bridge uses it to push an initial snapshot.
     */
    onSubscribe: ((clientId: string, topics: WsEventTopic[]) => void) | null = null;

    constructor(config: WsHubConfig) {
        this.#config = {
            apiSecret: config.apiSecret,
            authTimeoutMs: config.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS,
            heartbeatIntervalMs: config.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
            maxClientQueue: config.maxClientQueue ?? DEFAULT_MAX_CLIENT_QUEUE,
        };
        this.#commands = config.commands ?? null;
    }

    // ── Lifecycle ──────────────────────────────────────────────────────────────

    /**
     * Attach to an HTTP server on `/ws`. Must be called before the server accepts connections.
     */
    attach(server: Server): void {
        this.#wss = new WebSocketServer({ server, path: '/ws' });

        this.#wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
            this.#handleConnection(ws, req);
        });

        this.#heartbeatTimer = setInterval(() => {
            this.#runHeartbeat();
        }, this.#config.heartbeatIntervalMs);

        void logThought('[WsHub] WebSocket hub attached on /ws.');
    }

    /** Close every connection and shut the hub down. */
    stop(): void {
        if (this.#heartbeatTimer) {
            clearInterval(this.#heartbeatTimer);
            this.#heartbeatTimer = null;
        }

        for (const client of this.#clients.values()) {
            this.#closeClient(client, WsCloseCode.ServerShutdown, 'Server shutting down.');
        }
        this.#clients.clear();

        this.#wss?.close();
        this.#wss = null;
        void logThought('[WsHub] WebSocket hub stopped.');
    }

    // ── Publishing ─────────────────────────────────────────────────────────────

    /** Publish an event to every authenticated client subscribed to `topic`. */
    publish(topic: WsEventTopic, payload: unknown, options: PublishOptions = {}): void {
        const seq = ++this.#seq;
        const ts = new Date().toISOString();
        const envelope = JSON.stringify({ type: 'event', v: 1, topic, seq, ts, payload });

        this.#metrics.lastEventAt = ts;

        for (const client of this.#clients.values()) {
            if (!client.authenticated || !client.subscriptions.has(topic)) continue;
            if (options.requestId && client.requestFilter && !client.requestFilter.has(options.requestId)) continue;
            this.#sendRaw(client, envelope);
        }
    }

    /** Send a full-state snapshot to one client. */
    sendSnapshotTo(clientId: string, snapshot: Record<string, unknown>): void {
        const client = this.#clients.get(clientId);
        if (!client || !client.authenticated) return;

        this.#sendRaw(client, JSON.stringify({ type: 'snapshot', v: 1, ts: new Date().toISOString(), ...snapshot }));
    }

    // ── Diagnostics ────────────────────────────────────────────────────────────

    getMetrics(): WsHubMetrics {
        return { activeClients: this.#clients.size, ...this.#metrics };
    }

    // ── Connection Handling ─────────────────────────────────────────────────────

    #handleConnection(ws: WebSocket, _req: IncomingMessage): void {
        const clientId = randomUUID();
        this.#metrics.totalConnections++;

        const client: ClientState = {
            id: clientId,
            ws,
            authenticated: false,
            subscriptions: new Set(),
            requestFilter: null,
            authTimer: null,
            isAlive: true,
            connectedAt: Date.now(),
        };

        this.#clients.set(clientId, client);

        client.authTimer = setTimeout(() => {
            if (!client.authenticated) {
                this.#metrics.authFailures++;
                void logThought(`[WsHub] Client ${clientId} auth timeout; closing connection.`);
                this.#closeClient(client, WsCloseCode.AuthRequired, 'Authentication required.');
            }
        }, this.#config.authTimeoutMs);

        ws.on('pong', () => {
            client.isAlive = true;
        });

        ws.on('message', (data: RawData) => {
            this.#handleMessage(client, data);
        });

        ws.on('close', () => {
            this.#cleanupClient(client);
        });

        ws.on('error', (err: Error) => {
            void logThought(`[WsHub] Client ${clientId} socket error: ${err.message}`);
            this.#cleanupClient(client);
        });

        void logThought(`[WsHub] New connection: ${clientId}.`);
    }

    #handleMessage(client: ClientState, rawData: RawData): void {
        let msg: unknown;
        try {
            msg = JSON.parse(decodeFrame(rawData));
        } catch {
            this.#sendError(client, WsErrorCode.BadRequest, 'Invalid JSON.');
            return;
        }

        if (!isRecord(msg) || typeof msg.type !== 'string') {
            this.#sendError(client, WsErrorCode.BadRequest, 'Malformed message: missing "type" field.');
            return;
        }

        if (msg.type !== 'auth' && msg.type !== 'ping' && !client.authenticated) {
            this.#sendError(client, WsCloseCode.AuthRequired, 'Not authenticated.');
            return;
        }

        switch (msg.type) {
            case 'auth':
                this.#handleAuth(client, msg);
                break;
            case 'subscribe':
                this.#handleSubscribe(client, msg);
                break;
            case 'submit':
                this.#handleSubmit(client, msg);
                break;
            case 'cancel':
                this.#handleCancel(client, msg);
                break;
            case 'ping':
                this.#sendRaw(client, JSON.stringify({ type: 'pong', ts: new Date().toISOString() }));
                break;
            default:
                this.#sendError(client, WsErrorCode.BadRequest, `Unknown message type: ${msg.type}`);
        }
    }

    #handleAuth(client: ClientState, msg: Record<string, unknown>): void {
        const token = typeof msg.token === 'string' ? msg.token : '';
        const apiSecret = this.#config.apiSecret;

        if (!apiSecret || !token || !tokensMatch(token, apiSecret)) {
            this.#metrics.authFailures++;
            void logThought(`[WsHub] Client ${client.id} authentication failed (invalid token).`);
            this.#sendError(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            this.#closeClient(client, WsCloseCode.AuthFailed, 'Authentication failed.');
            return;
        }

        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }

        client.authenticated = true;
        this.#sendRaw(client, JSON.stringify({ type: 'auth_ok', clientId: client.id, ts: new Date().toISOString() }));
        void logThought(`[WsHub] Client ${client.id} authenticated.`);
    }

    #handleSubscribe(client: ClientState, msg: Record<string, unknown>): void {
        const rawTopics = Array.isArray(msg.topics) ? msg.topics : [];
        const validTopics = rawTopics.filter(isTopic);
        const invalidTopics = rawTopics.filter((topic) => !isTopic(topic)).map(String);

        if (invalidTopics.length > 0) {
            this.#sendError(
                client,
                WsCloseCode.InvalidSubscription,
                `Invalid topics: ${invalidTopics.join(', ')}. Valid topics: ${[...VALID_TOPICS].join(', ')}.`,
            );
            if (validTopics.length === 0) return;
        }

        for (const topic of validTopics) {
            client.subscriptions.add(topic);
        }
        if (Array.isArray(msg.requestIds)) {
            const ids = msg.requestIds.filter((id): id is string => typeof id === 'string' && id.length > 0);
            client.requestFilter = new Set([...(client.requestFilter ?? []), ...ids]);
        }

        this.#sendRaw(client, JSON.stringify({
            type: 'subscribed',
            topics: validTopics,
            requestIds: client.requestFilter ? [...client.requestFilter] : null,
            ts: new Date().toISOString(),
        }));
        void logThought(`[WsHub] Client ${client.id} subscribed to [${validTopics.join(', ')}].`);

        if (this.onSubscribe && validTopics.length > 0) {
            this.onSubscribe(client.id, validTopics);
        }
    }

    #handleSubmit(client: ClientState, msg: Record<string, unknown>): void {
        if (!this.#commands) {
            this.#sendError(client, WsErrorCode.Unavailable, 'Request submission is not available on this hub.');
            return;
        }
        const input = parseRequestInput(msg);
        if (typeof input === 'string') {
            this.#sendError(client, WsErrorCode.BadRequest, input);
            return;
        }

        try {
            const snapshot = this.#commands.submit(input);
            // Follow the request just submitted when the client already narrows its stream.
            client.requestFilter?.add(snapshot.id);
            this.#sendRaw(client, JSON.stringify({
                type: 'submitted',
                requestId: snapshot.id,
                status: snapshot.status,
                ...(typeof msg.ref === 'string' ? { ref: msg.ref } : {}),
                ts: new Date().toISOString(),
            }));
        } catch (err) {
            const { status, error } = mapError(err);
            this.#sendError(client, status, error.message);
        }
    }

    #handleCancel(client: ClientState, msg: Record<string, unknown>): void {
        if (!this.#commands) {
            this.#sendError(client, WsErrorCode.Unavailable, 'Request cancellation is not available on this hub.');
            return;
        }
        if (typeof msg.requestId !== 'string' || !msg.requestId) {
            this.#sendError(client, WsErrorCode.BadRequest, "'requestId' must be a non-empty string.");
            return;
        }

        try {
            const reason = typeof msg.reason === 'string' ? msg.reason : undefined;
            const cancelled = this.#commands.cancel(msg.requestId, reason);
            this.#sendRaw(client, JSON.stringify({
                type: 'cancel_result',
                requestId: msg.requestId,
                cancelled,
                ts: new Date().toISOString(),
            }));
        } catch (err) {
            const { status, error } = mapError(err);
            this.#sendError(client, status, error.message);
        }
    }

    // ── Heartbeat ──────────────────────────────────────────────────────────────

    #runHeartbeat(): void {
        for (const client of [...this.#clients.values()]) {
            if (!client.isAlive) {
                void logThought(`[WsHub] Client ${client.id} did not respond to ping; evicting stale connection.`);
                this.#metrics.staleCleaned++;
                this.#closeClient(client, WsCloseCode.StaleConnection, 'Stale connection.');
                continue;
            }

            client.isAlive = false;
            if (client.ws.readyState === WebSocket.OPEN) {
                client.ws.ping();
            }
        }
    }

    // ── Helpers ────────────────────────────────────────────────────────────────

    #closeClient(client: ClientState, code: number, reason: string): void {
        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }

        if (client.ws.readyState === WebSocket.OPEN || client.ws.readyState === WebSocket.CONNECTING) {
            client.ws.close(code, reason);
        }

        this.#clients.delete(client.id);
    }

    #cleanupClient(client: ClientState): void {
        if (client.authTimer) {
            clearTimeout(client.authTimer);
            client.authTimer = null;
        }

        if (this.#clients.delete(client.id)) {
            void logThought(`[WsHub] Client ${client.id} disconnected.`);
        }
    }

    #sendRaw(client: ClientState, data: string): void {
        if (client.ws.readyState !== WebSocket.OPEN) {
            return;
        }

        if (client.ws.bufferedAmount > this.#config.maxClientQueue * 1024) {
            this.#metrics.droppedEvents++;
            void logThought(`[WsHub] Client ${client.id} backpressure limit hit; dropping event.`);
            return;
        }

        client.ws.send(data, (err) => {
            if (err) {
                this.#metrics.droppedEvents++;
            }
        });
    }

    #sendError(client: ClientState, code: number, message: string): void {
        this.#sendRaw(
            client,
            JSON.stringify({ type: 'error', code, message, ts: new Date().toISOString() }),
        );
    }
}
