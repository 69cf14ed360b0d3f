import type { PatternCategory, PatternFlags } from '../types.js';
import type { ProbeContext } from './context.js';

/** A named boolean predicate over one run's probe context */
export type Probe = (context: ProbeContext) => boolean;

export interface ProbeDefinition {
  category: PatternCategory | (string & {});
  flag: string;
  probe: Probe;
}

/**
 * Open table of pattern probes. Entries are independent: adding or removing
 * one never changes another's result.
 */
export class PatternRegistry {
  private readonly entries = new Map<string, ProbeDefinition>();

  constructor(definitions: readonly ProbeDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: ProbeDefinition): this {
    const key = registryKey(definition.category, definition.flag);
    if (this.entries.has(key)) {
      throw new Error(`Probe already registered: ${definition.category}.${definition.flag}`);
    }
    this.entries.set(key, definition);
    return this;
  }

  unregister(category: string, flag: string): boolean {
    return this.entries.delete(registryKey(category, flag));
  }

  has(category: string, flag: string): boolean {
    return this.entries.has(registryKey(category, flag));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Evaluate every probe; categories and flags keep registration order */
  evaluate(context: ProbeContext): PatternFlags {
    const flags: PatternFlags = {};
    for (const { category, flag, probe } of this.entries.values()) {
      const group = flags[category] ?? (flags[category] = {});
      group[flag] = probe(context) === true;
    }
    return flags;
  }

  /** Copy of this registry that can be extended without touching the original */
  clone(): PatternRegistry {
    return new PatternRegistry([...this.entries.values()]);
  }
}

function registryKey(category: string, flag: string): string {
  return `${category}/${flag}`;
}
