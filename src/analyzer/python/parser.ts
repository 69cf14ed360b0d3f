import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { MalformedSourceError } from '../errors.js';
import type { ParsedSource, SyntaxNode } from '../types.js';

// tree-sitter rejects string inputs longer than its default buffer
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Parse Python source into a syntax tree.
 * Throws MalformedSourceError if the grammar had to recover from any error.
 */
export function parsePython(text: string): ParsedSource {
  // A fresh parser per run keeps concurrent runs independent
  const parser = new Parser();
  parser.setLanguage(Python);

  const tree = parser.parse(text, undefined, {
    bufferSize: Math.max(MIN_BUFFER_SIZE, text.length * 2),
  });
  const root = tree.rootNode;

  if (root.hasError) {
    const culprit = findFirstError(root);
    const at = culprit ?? root;
    throw new MalformedSourceError(
      culprit ? describeError(culprit) : 'invalid syntax',
      at.startPosition.row + 1,
      at.startPosition.column + 1
    );
  }

  return { text, tree, root, lines: splitLines(text) };
}

/** Split text the way Python's str.splitlines() does */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** First ERROR or MISSING node in document order */
function findFirstError(node: SyntaxNode): SyntaxNode | null {
  if (node.type === 'ERROR' || node.isMissing) return node;
  for (const child of node.children) {
    if (!child.hasError && !child.isMissing) continue;
    const found = findFirstError(child);
    if (found) return found;
  }
  return null;
}

function describeError(node: SyntaxNode): string {
  if (node.isMissing) {
    return `missing '${node.type}'`;
  }
  const snippet = node.text.split(/\r\n|\r|\n/)[0].trim();
  if (snippet.length === 0) return 'invalid syntax';
  return `unexpected '${snippet.length > 24 ? `${snippet.slice(0, 24)}...` : snippet}'`;
}
