/**
 * Command Registry
 * Explicit registration of SCPI command patterns, resolved per instrument type
 *
 * Registration happens once at startup. The first resolveFor() freezes the
 * registry; it is read-only from then on.
 */

import type { CommandHandler, InstrumentType, ResolvedCommand } from './types.js';

export interface RegisterOptions {
  /** Compile the pattern case-insensitively (default: true) */
  caseInsensitive?: boolean;
}

export interface CommandDefinition<I> {
  readonly owner: string;
  readonly name: string;
  readonly patterns: readonly RegExp[];
  readonly handler: CommandHandler<I>;
}

export interface CommandRegistry<I> {
  register(
    owner: string,
    name: string,
    pattern: string | RegExp,
    handler: CommandHandler<I>,
    options?: RegisterOptions
  ): void;
  resolveFor(type: InstrumentType): ResolvedCommand<I>[];
  getDefinitions(): CommandDefinition<I>[];
  isFrozen(): boolean;
}

interface MutableDefinition<I> {
  owner: string;
  name: string;
  patterns: RegExp[];
  handler: CommandHandler<I>;
}

function compilePattern(pattern: string | RegExp, caseInsensitive: boolean): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  // Stateful flags would make exec() depend on the previous match
  let flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  if (caseInsensitive && !flags.includes('i')) {
    flags += 'i';
  }
  return new RegExp(source, flags);
}

export function qualifiedKey(owner: string, name: string): string {
  return `${owner}.${name}`;
}

export function createCommandRegistry<I>(): CommandRegistry<I> {
  // Map preserves first-registration order of keys
  const definitions = new Map<string, MutableDefinition<I>>();
  let frozen = false;

  return {
    register(owner, name, pattern, handler, options = {}): void {
      if (frozen) {
        throw new Error(`Command registry is frozen, cannot register ${qualifiedKey(owner, name)}`);
      }
      const { caseInsensitive = true } = options;
      const key = qualifiedKey(owner, name);

      let definition = definitions.get(key);
      if (!definition) {
        definition = { owner, name, patterns: [], handler };
        definitions.set(key, definition);
      }
      definition.patterns.push(compilePattern(pattern, caseInsensitive));
    },

    resolveFor(type: InstrumentType): ResolvedCommand<I>[] {
      frozen = true;
      // Direct parents only; grandparents are not walked
      const owners = [type.name, ...type.parents];
      const resolved: ResolvedCommand<I>[] = [];

      for (const [key, definition] of definitions) {
        if (!owners.some(owner => key.startsWith(owner + '.'))) continue;
        for (const pattern of definition.patterns) {
          resolved.push({ key, pattern, handler: definition.handler });
        }
      }
      return resolved;
    },

    getDefinitions(): CommandDefinition<I>[] {
      return [...definitions.values()].map(d => ({
        owner: d.owner,
        name: d.name,
        patterns: [...d.patterns],
        handler: d.handler,
      }));
    },

    isFrozen: () => frozen,
  };
}
