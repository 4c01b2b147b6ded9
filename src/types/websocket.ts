// ── Close Codes ────────────────────────────────────────────────────────────────

/** Deterministic close codes for WebSocket lifecycle events. */
export const WsCloseCode = {
    /** Authentication token missing or invalid. */
    AuthFailed: 4001,
    /** Client did not complete auth handshake within the required window. */
    AuthRequired: 4002,
    /** Subscription request contains an unrecognised topic. */
    InvalidSubscription: 4003,
    /** Client failed to respond to ping heartbeats (stale). */
    StaleConnection: 4004,
    /** Server is shutting down gracefully. */
    ServerShutdown: 4005,
} as const;

export type WsCloseCode = (typeof WsCloseCode)[keyof typeof WsCloseCode];

/** Error codes sent in `error` frames that do not close the socket. */
export const WsErrorCode = {
    BadRequest: 400,
    NotFound: 404,
    Conflict: 409,
    QueueFull: 429,
    Unavailable: 503,
} as const;

// ── Event Topics ───────────────────────────────────────────────────────────────

/** All subscribable runtime event topics. */
export type WsEventTopic = 'requests' | 'backends';

// ── Inbound Messages (client → server) ────────────────────────────────────────

/** First message a client MUST send to authenticate the session. */
export interface WsAuthMessage {
    type: 'auth';
    /** Must equal the configured API_SECRET. */
    token: string;
}

/** Subscribe to topics; `requestIds` narrows `requests` events to those requests. */
export interface WsSubscribeMessage {
    type: 'subscribe';
    topics: WsEventTopic[];
    requestIds?: string[];
}

/** Enqueue a request; answered with `submitted`. */
export interface WsSubmitMessage {
    type: 'submit';
    text: string;
    metadata?: Record<string, unknown>;
    /** Echoed back so the client can correlate the answer. */
    ref?: string;
}

export interface WsCancelMessage {
    type: 'cancel';
    requestId: string;
    reason?: string;
}

/** Client-initiated ping to keep the connection alive. */
export interface WsPingMessage {
    type: 'ping';
}

export type WsInboundMessage =
    | WsAuthMessage
    | WsSubscribeMessage
    | WsSubmitMessage
    | WsCancelMessage
    | WsPingMessage;

// ── Outbound Messages (server → client) ────────────────────────────────────────

export interface WsAuthOkMessage {
    type: 'auth_ok';
    clientId: string;
    ts: string;
}

export interface WsSubscribedMessage {
    type: 'subscribed';
    topics: WsEventTopic[];
    requestIds: string[] | null;
    ts: string;
}

export interface WsSubmittedMessage {
    type: 'submitted';
    requestId: string;
    status: string;
    ref?: string;
    ts: string;
}

export interface WsCancelledMessage {
    type: 'cancel_result';
    requestId: string;
    cancelled: boolean;
    ts: string;
}

export interface WsErrorMessage {
    type: 'error';
    code: number;
    message: string;
    ts: string;
}

export interface WsPongMessage {
    type: 'pong';
    ts: string;
}

// ── Event Envelope ─────────────────────────────────────────────────────────────

/**
 * Versioned wrapper for every runtime event pushed over the socket.
 */
export interface WsEventEnvelope<T = unknown> {
    type: 'event';
    /** Schema version; bumped when the envelope shape changes. */
    v: 1;
    topic: WsEventTopic;
    /** Monotonically increasing sequence number per hub instance. */
    seq: number;
    ts: string;
    payload: T;
}

/** Initial state pushed to a client right after it subscribes. */
export interface WsSnapshotPayload {
    type: 'snapshot';
    v: 1;
    ts: string;
    requests?: unknown;
    backends?: unknown;
}

// ── Hub Diagnostics ────────────────────────────────────────────────────────────

export interface WsHubMetrics {
    activeClients: number;
    totalConnections: number;
    authFailures: number;
    droppedEvents: number;
    staleCleaned: number;
    lastEventAt: string | null;
}
