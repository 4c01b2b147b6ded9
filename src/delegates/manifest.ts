import { DelegateTable } from '../core/delegate-table.js';
import { ReasoningLoop, type ReasoningBackend, type ReasoningLoopOptions } from '../core/reasoning-loop.js';
import { VoxloopError } from '../core/errors.js';
import { createAgentDelegate } from './agent-delegate.js';
import { ShellDelegate, type ShellDelegateOptions } from './shell.js';
import type { Delegate } from './types.js';

export type DelegateManifestEntry =
  | {
      type: 'shell';
      /** Visible to the top-level loop; otherwise only agents that list it can call it. @default true */
      exposed?: boolean;
      options?: ShellDelegateOptions;
    }
  | {
      type: 'agent';
      name: string;
      description: string;
      instructions?: string;
      /** Names of delegates declared earlier in the manifest. */
      delegates: string[];
      maxIterations?: number;
      exposed?: boolean;
    };

export interface DelegateManifest {
  delegates: DelegateManifestEntry[];
}

export const DEFAULT_DELEGATE_MANIFEST: DelegateManifest = {
  delegates: [
    { type: 'shell', exposed: false },
    {
      type: 'agent',
      name: 'command_line',
      description: 'Inspects the local machine by running safe, read-only shell commands.',
      instructions:
        'You answer questions about the local machine. Use the shell delegate for one command at a time and report what you found.',
      delegates: ['shell'],
      maxIterations: 5,
    },
  ],
};

export interface ManifestDependencies {
  backend: ReasoningBackend;
  /** Budgets for the nested loops of agent delegates. */
  loopOptions?: ReasoningLoopOptions;
}

/**
 * Build the top-level delegate table from an explicit manifest. Entries are processed in order,
 * so an agent can only reference delegates declared before it.
 */
export function buildDelegateTable(manifest: DelegateManifest, deps: ManifestDependencies): DelegateTable {
  const declared = new Map<string, Delegate>();
  const root = new DelegateTable();

  for (const entry of manifest.delegates) {
    const delegate = createDelegate(entry, declared, deps);
    if (declared.has(delegate.name)) {
      throw new VoxloopError('duplicate_delegate', `Manifest declares '${delegate.name}' more than once.`);
    }
    declared.set(delegate.name, delegate);
    if (entry.exposed !== false) {
      root.register(delegate);
    }
  }

  return root;
}

function createDelegate(
  entry: DelegateManifestEntry,
  declared: Map<string, Delegate>,
  deps: ManifestDependencies,
): Delegate {
  switch (entry.type) {
    case 'shell':
      return new ShellDelegate(entry.options);
    case 'agent': {
      const table = new DelegateTable();
      for (const name of entry.delegates) {
        const delegate = declared.get(name);
        if (!delegate) {
          throw new VoxloopError(
            'invalid_manifest',
            `Agent '${entry.name}' references '${name}', which is not declared before it.`,
          );
        }
        table.register(delegate);
      }
      const loop = new ReasoningLoop(deps.backend, table, {
        ...deps.loopOptions,
        agentName: entry.name,
        instructions: entry.instructions,
      });
      return createAgentDelegate({
        name: entry.name,
        description: entry.description,
        loop,
        maxIterations: entry.maxIterations,
      });
    }
  }
}
