import { TrieInvariantError, type InvariantViolation } from './errors';
import type { RadixNode, RadixTrie } from './radix';

export interface ExpectedCounts {
  /** Expected number of terminal nodes. */
  size?: number;
  /** Expected number of nodes, root included. */
  nodeCount?: number;
}

export interface KeyReport {
  ok: boolean;
  /** Expected words the trie does not list. */
  missing: string[];
  /** Listed words that were not expected. */
  unexpected: string[];
}

/**
 * Walk the whole tree and report every broken structural invariant:
 * children keyed by their label's first character, no empty labels below the
 * root, and no non-terminal node with fewer than two children.
 */
export function checkInvariants(root: RadixNode, expected?: ExpectedCounts): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  let terminals = 0;
  let nodes = 0;

  if (root.label !== '') {
    violations.push({ path: '', message: `root label must be empty, found "${root.label}"` });
  }

  const walk = (node: RadixNode, path: string, isRoot: boolean) => {
    nodes++;
    if (node.terminal) terminals++;

    if (!isRoot) {
      if (node.label.length === 0) {
        violations.push({ path, message: 'empty edge label' });
      }
      if (!node.terminal && node.children.size < 2) {
        violations.push({ path, message: `non-terminal node has ${node.children.size} child(ren)` });
      }
    }

    for (const [key, child] of node.children) {
      const childPath = path + child.label;
      if (child.label.charAt(0) !== key) {
        violations.push({
          path: childPath,
          message: `stored under "${key}" but label starts with "${child.label.charAt(0)}"`,
        });
      }
      walk(child, childPath, false);
    }
  };
  walk(root, '', true);

  if (expected?.size !== undefined && expected.size !== terminals) {
    violations.push({ path: '', message: `size is ${expected.size} but ${terminals} nodes are terminal` });
  }
  if (expected?.nodeCount !== undefined && expected.nodeCount !== nodes) {
    violations.push({ path: '', message: `nodeCount is ${expected.nodeCount} but the tree has ${nodes} nodes` });
  }

  return violations;
}

export function assertInvariants(root: RadixNode, expected?: ExpectedCounts): void {
  const violations = checkInvariants(root, expected);
  if (violations.length > 0) throw new TrieInvariantError(violations);
}

/** Compare the words a trie lists against the set it should hold. */
export function verifyKeys(trie: RadixTrie, expected: Iterable<string>): KeyReport {
  const want = new Set(expected);
  const have = new Set(trie.words());

  const missing = [...want].filter((w) => !have.has(w));
  const unexpected = [...have].filter((w) => !want.has(w));

  return { ok: missing.length === 0 && unexpected.length === 0, missing, unexpected };
}
