import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parsePython } from '../src/analyzer/python/parser.js';
import { extractEntities } from '../src/analyzer/entity-extractor.js';
import type { EntityInventory, FunctionEntity, ParsedSource } from '../src/analyzer/types.js';

export const FIXTURE_DIR = fileURLToPath(new URL('./fixtures/python', import.meta.url));

export function fixturePath(name: string): string {
  return resolve(FIXTURE_DIR, name);
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}

/** Join lines into a source text with a trailing newline */
export function source(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

export function inventoryOf(text: string): { parsed: ParsedSource; inventory: EntityInventory } {
  const parsed = parsePython(text);
  return { parsed, inventory: extractEntities(parsed) };
}

export function callable(inventory: EntityInventory, id: string): FunctionEntity {
  const entity = inventory.callables.find(fn => fn.id === id);
  if (!entity) {
    throw new Error(`No callable ${id} in inventory`);
  }
  return entity;
}
