import type { Delegate, DelegateDescriptor } from '../delegates/types.js';
import { DelegateNotFoundError, DuplicateDelegateError } from './errors.js';
import { logThought } from '../utils/logger.js';

/**
 * Name-keyed catalog of delegates available to a reasoning loop.
 *
 * Entries are frozen at registration and live for as long as the table does. Tools and
 * sub-agents share the table; dispatch never looks past the name.
 *
 * ```ts
 * const table = new DelegateTable();
 * table.register(new ShellDelegate({ cwd: process.cwd() }));
 * const shell = table.resolve('shell');
 * ```
 */
export class DelegateTable {
    readonly #delegates: Map<string, Delegate> = new Map();

    /** Register a delegate. Throws {@link DuplicateDelegateError} when the name is taken. */
    register(delegate: Delegate): void {
        const name = delegate.name.trim();
        if (!name) {
            throw new TypeError('Delegate name must be a non-empty string.');
        }
        if (this.#delegates.has(name)) {
            throw new DuplicateDelegateError(name);
        }

        this.#delegates.set(name, Object.freeze({ ...bindInvoke(delegate), name }));
        void logThought(`[DelegateTable] Registered delegate '${name}' (${delegate.kind ?? 'tool'}).`);
    }

    registerMany(delegates: Delegate[]): void {
        for (const delegate of delegates) {
            this.register(delegate);
        }
    }

    get(name: string): Delegate | undefined {
        return this.#delegates.get(name);
    }

    has(name: string): boolean {
        return this.#delegates.has(name);
    }

    /** Look up a delegate, throwing {@link DelegateNotFoundError} listing the known names. */
    resolve(name: string): Delegate {
        const delegate = this.#delegates.get(name);
        if (!delegate) {
            throw new DelegateNotFoundError(name, this.names());
        }
        return delegate;
    }

    names(): string[] {
        return [...this.#delegates.keys()];
    }

    /** Catalog in registration order, as rendered to the reasoning backend. */
    describe(): DelegateDescriptor[] {
        return [...this.#delegates.values()].map((delegate) => ({
            name: delegate.name,
            description: delegate.description,
            kind: delegate.kind ?? 'tool',
            ...(delegate.parameters ? { parameters: delegate.parameters } : {}),
        }));
    }

    get size(): number {
        return this.#delegates.size;
    }
}

// Class-based delegates keep their prototype methods working after the spread copy.
function bindInvoke(delegate: Delegate): Delegate {
    return {
        name: delegate.name,
        description: delegate.description,
        kind: delegate.kind ?? 'tool',
        ...(delegate.parameters ? { parameters: delegate.parameters } : {}),
        invoke: (input, context) => delegate.invoke(input, context),
    };
}
