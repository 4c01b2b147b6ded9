import {
  BackendNotReadyError,
  DuplicateBackendError,
  TimeoutError,
  UnknownBackendError,
  toErrorMessage,
} from '../core/errors.js';
import type {
  BackendDescriptor,
  BackendFamily,
  BackendHealthCheck,
  BackendInitReport,
  BackendProvider,
  BackendReadinessState,
  BackendRegistryEvent,
  RegistryInitSummary,
} from '../types/backends.js';
import { logThought } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

const DEFAULT_INIT_TIMEOUT_MS = 120_000;
const DEFAULT_SELECT_TIMEOUT_MS = 30_000;
const DEFAULT_HEALTH_TTL_MS = 10_000;
const DEFAULT_HEALTH_TIMEOUT_MS = 5_000;

export interface BackendRegistryOptions {
  /** Provider to select after initialization when it is ready. Defaults to the first registered. */
  preferredId?: string;
  /** Upper bound for one provider's `prepare()`. @default 120000 */
  initTimeoutMs?: number;
  /** How long `select` waits for a provider that is still initializing. @default 30000 */
  selectTimeoutMs?: number;
  /** How long a health probe result is reused. @default 10000 */
  healthTtlMs?: number;
  /** Upper bound for one health probe. @default 5000 */
  healthTimeoutMs?: number;
}

export type BackendRegistryListener = (event: BackendRegistryEvent) => void;

type Entry<P extends BackendProvider> = {
  provider: P;
  state: Exclude<BackendReadinessState, 'unregistered'>;
  failureReason: string | null;
  lastHealth: BackendHealthCheck | null;
  lastHealthAt: number;
  preparedAt: string | null;
  preparation: Promise<BackendInitReport> | null;
  probe: Promise<BackendHealthCheck> | null;
  settled: Promise<void>;
  markSettled: () => void;
};

function createSettleSignal(): { settled: Promise<void>; markSettled: () => void } {
  let markSettled: () => void = () => undefined;
  const settled = new Promise<void>((resolve) => {
    markSettled = resolve;
  });
  return { settled, markSettled };
}

/**
 * Owns every provider of one capability family and a single selected-id pointer.
 *
 * Providers are prepared concurrently and at most once; a provider that fails stays registered
 * with its reason and never takes the registry down. Swapping the selection replaces the
 * pointer only, so work already holding a provider from {@link current} finishes against it.
 */
export class BackendRegistry<P extends BackendProvider> {
  readonly #family: BackendFamily;
  readonly #preferredId: string | undefined;
  readonly #initTimeoutMs: number;
  readonly #selectTimeoutMs: number;
  readonly #healthTtlMs: number;
  readonly #healthTimeoutMs: number;
  readonly #entries: Map<string, Entry<P>> = new Map();
  readonly #listeners: Set<BackendRegistryListener> = new Set();
  #selectedId: string | null = null;
  #explicitSelection = false;

  constructor(family: BackendFamily, options: BackendRegistryOptions = {}) {
    this.#family = family;
    this.#preferredId = options.preferredId?.trim() || undefined;
    this.#initTimeoutMs = Math.max(1, options.initTimeoutMs ?? DEFAULT_INIT_TIMEOUT_MS);
    this.#selectTimeoutMs = Math.max(1, options.selectTimeoutMs ?? DEFAULT_SELECT_TIMEOUT_MS);
    this.#healthTtlMs = Math.max(0, options.healthTtlMs ?? DEFAULT_HEALTH_TTL_MS);
    this.#healthTimeoutMs = Math.max(1, options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS);
  }

  get family(): BackendFamily {
    return this.#family;
  }

  /** Add a provider in state `initializing`. The first one (or the preferred one) is selected provisionally. */
  register(provider: P): void {
    const id = provider.id;
    if (!id.trim()) {
      throw new TypeError(`${this.#family} backend id must be a non-empty string.`);
    }
    if (this.#entries.has(id)) {
      throw new DuplicateBackendError(this.#family, id);
    }

    this.#entries.set(id, {
      provider,
      state: 'initializing',
      failureReason: null,
      lastHealth: null,
      lastHealthAt: 0,
      preparedAt: null,
      preparation: null,
      probe: null,
      ...createSettleSignal(),
    });

    if (!this.#explicitSelection && (this.#selectedId === null || id === this.#preferredId)) {
      this.#setSelected(id);
    }
    void logThought(`[BackendRegistry] Registered ${this.#family} backend '${id}'.`);
  }

  has(id: string): boolean {
    return this.#entries.has(id);
  }

  ids(): string[] {
    return [...this.#entries.keys()];
  }

  /** Readiness of `id`; `unregistered` for ids this registry does not hold. */
  state(id: string): BackendReadinessState {
    return this.#entries.get(id)?.state ?? 'unregistered';
  }

  selectedId(): string | null {
    return this.#selectedId;
  }

  /**
   * Prepare every registered provider concurrently. Each settles as `ready` or `failed` on its
   * own; afterwards the selection falls to the preferred provider if ready, else the first ready
   * one, else stays on the preferred provider with its failure reason retrievable. An explicit
   * {@link select} is never overridden.
   */
  async initializeAll(): Promise<RegistryInitSummary> {
    const entries = [...this.#entries.values()];
    const settled = await Promise.allSettled(entries.map((entry) => this.#prepare(entry)));
    const reports = settled.map((outcome, index): BackendInitReport => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      return {
        id: entries[index].provider.id,
        state: 'failed',
        durationMs: 0,
        error: toErrorMessage(outcome.reason),
      };
    });

    this.#applySelectionPolicy();

    const ready = reports.filter((report) => report.state === 'ready').length;
    void logThought(
      `[BackendRegistry] ${this.#family}: ${ready}/${reports.length} backend(s) ready; selected '${this.#selectedId ?? 'none'}'.`,
    );

    return { family: this.#family, selectedId: this.#selectedId, reports };
  }

  /** Run preparation again for a provider that failed. Other states are reported unchanged. */
  async reinitialize(id: string): Promise<BackendInitReport> {
    const entry = this.#require(id);
    if (entry.state !== 'failed') {
      return { id, state: entry.state, durationMs: 0 };
    }

    entry.preparation = null;
    entry.failureReason = null;
    Object.assign(entry, createSettleSignal());
    this.#setState(entry, 'initializing');

    const report = await this.#prepare(entry);
    this.#applySelectionPolicy();
    return report;
  }

  /**
   * Point the family at `id`. Unknown ids and failed providers are rejected with the pointer
   * left untouched; a provider still initializing is awaited up to `selectTimeoutMs`.
   */
  async select(id: string): Promise<BackendDescriptor> {
    const entry = this.#require(id);

    if (entry.state === 'initializing') {
      try {
        await withTimeout(entry.settled, this.#selectTimeoutMs, `Selecting ${this.#family} backend '${id}'`);
      } catch (error) {
        if (error instanceof TimeoutError) {
          throw new BackendNotReadyError(
            this.#family,
            id,
            `still initializing after ${this.#selectTimeoutMs}ms`,
          );
        }
        throw error;
      }
    }

    if (entry.state === 'failed' || entry.state === 'initializing') {
      throw new BackendNotReadyError(this.#family, id, entry.failureReason ?? 'initialization did not complete');
    }

    this.#explicitSelection = true;
    this.#setSelected(id);
    return this.#describe(entry);
  }

  /** The selected provider, whatever its state. Never waits. */
  current(): P {
    const entry = this.#selectedId === null ? undefined : this.#entries.get(this.#selectedId);
    if (!entry) {
      throw new BackendNotReadyError(this.#family, 'none', `no ${this.#family} backends are registered`);
    }
    return entry.provider;
  }

  describe(id: string): BackendDescriptor {
    return this.#describe(this.#require(id));
  }

  list(): BackendDescriptor[] {
    return [...this.#entries.values()].map((entry) => this.#describe(entry));
  }

  /**
   * Probe ready and degraded providers, reusing results younger than `healthTtlMs` unless
   * `refresh` is set. Concurrent calls share one in-flight probe per provider.
   */
  async health(options: { refresh?: boolean } = {}): Promise<BackendDescriptor[]> {
    const entries = [...this.#entries.values()];
    await Promise.all(
      entries
        .filter((entry) => entry.state === 'ready' || entry.state === 'degraded')
        .map((entry) => this.#probe(entry, options.refresh === true)),
    );
    return entries.map((entry) => this.#describe(entry));
  }

  subscribe(listener: BackendRegistryListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  async shutdown(): Promise<void> {
    const results = await Promise.allSettled(
      [...this.#entries.values()].map(async (entry) => {
        await entry.provider.dispose?.();
      }),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        console.error(
          `[BackendRegistry] Failed to dispose a ${this.#family} backend: ${toErrorMessage(result.reason)}`,
        );
      }
    }
  }

  #require(id: string): Entry<P> {
    const entry = this.#entries.get(id);
    if (!entry) {
      throw new UnknownBackendError(this.#family, id, this.ids());
    }
    return entry;
  }

  #prepare(entry: Entry<P>): Promise<BackendInitReport> {
    if (!entry.preparation) {
      entry.preparation = this.#runPreparation(entry);
    }
    return entry.preparation;
  }

  async #runPreparation(entry: Entry<P>): Promise<BackendInitReport> {
    const { provider } = entry;
    const startedAt = Date.now();
    const controller = new AbortController();

    try {
      if (provider.prepare) {
        await withTimeout(
          provider.prepare(controller.signal),
          this.#initTimeoutMs,
          `Preparing ${this.#family} backend '${provider.id}'`,
          { controller },
        );
      }
      entry.preparedAt = new Date().toISOString();
      entry.failureReason = null;
      this.#setState(entry, 'ready');
      entry.markSettled();
      return { id: provider.id, state: 'ready', durationMs: Date.now() - startedAt };
    } catch (error) {
      const reason = toErrorMessage(error);
      entry.failureReason = reason;
      this.#setState(entry, 'failed');
      entry.markSettled();
      void logThought(`[BackendRegistry] ${this.#family} backend '${provider.id}' failed to initialize: ${reason}`);
      return { id: provider.id, state: 'failed', durationMs: Date.now() - startedAt, error: reason };
    }
  }

  #probe(entry: Entry<P>, refresh: boolean): Promise<BackendHealthCheck> {
    if (entry.probe) {
      return entry.probe;
    }
    if (!refresh && entry.lastHealth && Date.now() - entry.lastHealthAt < this.#healthTtlMs) {
      return Promise.resolve(entry.lastHealth);
    }

    entry.probe = this.#runProbe(entry).finally(() => {
      entry.probe = null;
    });
    return entry.probe;
  }

  async #runProbe(entry: Entry<P>): Promise<BackendHealthCheck> {
    let check: BackendHealthCheck;
    try {
      const result = await withTimeout(
        entry.provider.healthCheck(),
        this.#healthTimeoutMs,
        `Health check of ${this.#family} backend '${entry.provider.id}'`,
      );
      check = { ...result, checkedAt: new Date().toISOString() };
    } catch (error) {
      check = { ok: false, reason: toErrorMessage(error), checkedAt: new Date().toISOString() };
    }

    entry.lastHealth = check;
    entry.lastHealthAt = Date.now();
    if (check.ok && entry.state === 'degraded') {
      this.#setState(entry, 'ready');
    } else if (!check.ok && entry.state === 'ready') {
      this.#setState(entry, 'degraded');
    }
    return check;
  }

  #applySelectionPolicy(): void {
    if (this.#explicitSelection || this.#entries.size === 0) {
      return;
    }

    const preferredId =
      this.#preferredId && this.#entries.has(this.#preferredId) ? this.#preferredId : this.ids()[0];
    const isReady = (id: string): boolean => this.#entries.get(id)?.state === 'ready';
    const firstReady = this.ids().find(isReady);

    const nextId = isReady(preferredId) ? preferredId : (firstReady ?? preferredId);
    this.#setSelected(nextId);
  }

  #setSelected(id: string): void {
    const previousId = this.#selectedId;
    if (previousId === id) {
      return;
    }
    this.#selectedId = id;
    this.#emit({ type: 'backend.selected', family: this.#family, previousId, selectedId: id });
  }

  #setState(entry: Entry<P>, state: Entry<P>['state']): void {
    if (entry.state === state) {
      return;
    }
    entry.state = state;
    this.#emit({ type: 'backend.state', family: this.#family, backend: this.#describe(entry) });
  }

  #emit(event: BackendRegistryEvent): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[BackendRegistry] Listener failed: ${toErrorMessage(error)}`);
      }
    }
  }

  #describe(entry: Entry<P>): BackendDescriptor {
    return {
      id: entry.provider.id,
      displayName: entry.provider.displayName,
      family: this.#family,
      state: entry.state,
      selected: entry.provider.id === this.#selectedId,
      failureReason: entry.failureReason,
      lastHealth: entry.lastHealth ? { ...entry.lastHealth } : null,
      preparedAt: entry.preparedAt,
    };
  }
}
