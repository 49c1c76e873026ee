/**
 * Depth-first text renderings of a radix trie.
 *
 * Nothing here prints: every line goes to a caller-supplied writer, so the
 * caller decides whether it ends up on stdout, in an array or in a log.
 */

import { InvalidRenderModeError } from './errors';
import type { RadixNode } from './radix';

export type RenderMode = 'list' | 'tree';

/** Receives one rendered line at a time, without a trailing newline. */
export type LineWriter = (line: string) => void;

export const RENDER_MODES: readonly RenderMode[] = ['list', 'tree'];

export function isRenderMode(mode: string): mode is RenderMode {
  return mode === 'list' || mode === 'tree';
}

/** Write the full word at every terminal node. */
export function renderList(root: RadixNode, write: LineWriter): void {
  const walk = (node: RadixNode, path: string) => {
    if (node.terminal) write(path);
    for (const child of node.children.values()) {
      walk(child, path + child.label);
    }
  };
  walk(root, root.label);
}

/**
 * Write every node as `#`×(depth+1), its label, and `*` when it ends a word.
 *
 *   #
 *   ## car *
 *   ### t *
 */
export function renderTree(root: RadixNode, write: LineWriter): void {
  const walk = (node: RadixNode, depth: number) => {
    const parts = ['#'.repeat(depth + 1)];
    if (node.label.length > 0) parts.push(node.label);
    if (node.terminal) parts.push('*');
    write(parts.join(' '));

    for (const child of node.children.values()) {
      walk(child, depth + 1);
    }
  };
  walk(root, 0);
}

/** Render in the named mode. Throws `InvalidRenderModeError` before writing anything for an unknown mode. */
export function renderTrie(root: RadixNode, mode: string, write: LineWriter): void {
  if (!isRenderMode(mode)) throw new InvalidRenderModeError(mode);

  switch (mode) {
    case 'list':
      renderList(root, write);
      break;
    case 'tree':
      renderTree(root, write);
      break;
  }
}
