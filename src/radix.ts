/**
 * RadixTrie — a compressed prefix trie (Patricia trie) for autocomplete.
 *
 * Unlike a standard trie where each edge is a single character, a radix trie
 * merges chains of single-child nodes into edges with multi-character labels.
 * Every mutation keeps the tree maximally compressed: inserts split an edge
 * where a new word diverges, removals merge a leftover single child back
 * into its parent edge.
 *
 * Example: inserting "car", "card", "cart" produces:
 *   root --"car"--> node (word)
 *                     |--"d"--> leaf (word)
 *                     |--"t"--> leaf (word)
 *
 * Instead of the standard trie's 5 nodes (c, a, r, d, t), we have 3.
 */

import { renderList, renderTrie, type LineWriter } from './render';
import { assertInvariants } from './verify';

// ─── Types ──────────────────────────────────────────────────────────

export interface RadixNode {
  /** Edge label from the parent to this node. Empty only for the root. */
  label: string;
  /** True if the path from the root to this node spells a stored word. */
  terminal: boolean;
  /**
   * Children keyed by the first character of their label.
   * This allows O(1) lookup when navigating the trie.
   */
  children: Map<string, RadixNode>;
}

/**
 * Read-only view of a node returned by `find`. It reads the live node, so it
 * reflects later mutations of that node until the node leaves the tree.
 */
export interface RadixNodeHandle {
  /** The node's full edge label. */
  label(): string;
  /** True only when the query spelled a stored word exactly. */
  isTerminal(): boolean;
  /** True when the query ended inside this node's edge label. */
  isPartial(): boolean;
}

export type LookupResult = 'word' | 'prefix' | 'none';

export interface RadixTrieOptions {
  /** Match case exactly. When false, words are lower-cased. Default true. */
  caseSensitive?: boolean;
  /** Check the tree invariants after every mutation. Default false. */
  verify?: boolean;
}

/** Stats about the trie, useful for compression reporting. */
export interface RadixTrieStats {
  /** Total number of stored words. */
  entryCount: number;
  /** Total number of nodes in the radix trie. */
  nodeCount: number;
  /** Total characters across all edge labels. */
  totalEdgeChars: number;
}

/** Where a walk ended: the node below the last edge touched, and any label left unmatched. */
interface Landing {
  node: RadixNode;
  rest: string;
}

// ─── Helpers ────────────────────────────────────────────────────────

function createRadixNode(label: string, terminal: boolean): RadixNode {
  return { label, terminal, children: new Map() };
}

function createHandle(node: RadixNode, partial: boolean): RadixNodeHandle {
  return {
    label: () => node.label,
    isTerminal: () => node.terminal && !partial,
    isPartial: () => partial,
  };
}

/** Length of the common prefix of `label` and `text` starting at `offset`. */
function commonPrefixLength(label: string, text: string, offset: number): number {
  const max = Math.min(label.length, text.length - offset);
  let i = 0;
  while (i < max && label.charCodeAt(i) === text.charCodeAt(offset + i)) i += 1;
  return i;
}

function collectSuffixes(node: RadixNode, suffix: string, results: string[]): void {
  if (node.terminal && suffix.length > 0) results.push(suffix);
  for (const child of node.children.values()) {
    collectSuffixes(child, suffix + child.label, results);
  }
}

// ─── RadixTrie ──────────────────────────────────────────────────────

export class RadixTrie {
  readonly root: RadixNode = createRadixNode('', false);
  private _size = 0;
  private _nodeCount = 1; // root counts as 1
  private caseSensitive: boolean;
  private verify: boolean;

  constructor(options?: RadixTrieOptions) {
    this.caseSensitive = options?.caseSensitive ?? true;
    this.verify = options?.verify ?? false;
  }

  /** Insert a word. Inserting a stored word again is a no-op. */
  insert(word: string): void {
    const text = this.toKey(word);
    if (this.insertAt(text)) {
      this._size++;
      this.check();
    }
  }

  /** Returns false when the word was already stored. */
  private insertAt(text: string): boolean {
    let node = this.root;
    let pos = 0;

    while (pos < text.length) {
      const ch = text[pos];
      const child = node.children.get(ch);

      if (!child) {
        // No matching edge — the rest of the word becomes a new leaf
        node.children.set(ch, createRadixNode(text.slice(pos), true));
        this._nodeCount++;
        return true;
      }

      const label = child.label;
      const j = commonPrefixLength(label, text, pos);

      if (j === label.length) {
        // Full edge match — continue below the child
        node = child;
        pos += j;
        continue;
      }

      // Partial match — split the edge at position j (j > 0, the first character matched)
      // Before: node --label--> child
      // After:  node --label[:j]--> splitNode --label[j:]--> child
      //                                        --text[pos+j:]--> newLeaf (if text continues)
      const splitNode = createRadixNode(label.slice(0, j), false);
      child.label = label.slice(j);
      splitNode.children.set(child.label[0], child);
      node.children.set(ch, splitNode);
      this._nodeCount++;

      if (pos + j >= text.length) {
        // Word ends exactly at the split point
        splitNode.terminal = true;
      } else {
        const rest = text.slice(pos + j);
        splitNode.children.set(rest[0], createRadixNode(rest, true));
        this._nodeCount++;
      }
      return true;
    }

    if (node.terminal) return false;
    node.terminal = true;
    return true;
  }

  /**
   * Find the node spelled by `query`, or null if no path spells it.
   *
   * With `allowPartial`, a query that ends inside an edge label still
   * matches; the handle then reports `isPartial()` and is never terminal.
   */
  find(query: string, allowPartial = false): RadixNodeHandle | null {
    const landing = this.descend(this.toKey(query), allowPartial);
    if (!landing) return null;
    return createHandle(landing.node, landing.rest.length > 0);
  }

  /** True if `word` is a stored word. */
  has(word: string): boolean {
    return this.find(word)?.isTerminal() === true;
  }

  /** Classify `query` as a stored word, a prefix of one, or neither. */
  lookup(query: string, allowPartial = false): LookupResult {
    const handle = this.find(query, allowPartial);
    if (!handle) return 'none';
    return handle.isTerminal() ? 'word' : 'prefix';
  }

  /** Navigate to the node spelled by `text`, or null if there is no match. */
  private descend(text: string, allowPartial: boolean): Landing | null {
    let node = this.root;
    let pos = 0;

    while (pos < text.length) {
      const child = node.children.get(text[pos]);
      if (!child) return null;

      const label = child.label;
      const j = commonPrefixLength(label, text, pos);

      if (j === label.length) {
        node = child;
        pos += j;
        continue;
      }

      // Text ran out inside the label
      if (allowPartial && pos + j === text.length) {
        return { node: child, rest: label.slice(j) };
      }
      return null;
    }

    return { node, rest: '' };
  }

  /** Remove a word. Returns false (and changes nothing) if it was not stored. */
  remove(word: string): boolean {
    const text = this.toKey(word);
    let removed: boolean;

    if (text.length === 0) {
      removed = this.root.terminal;
      this.root.terminal = false;
    } else {
      removed = this.removeBelow(this.root, text, 0);
    }

    if (removed) {
      this._size--;
      this.check();
    }
    return removed;
  }

  /**
   * Remove `text[pos:]` from the subtree under `parent`, then compact the
   * child it descended through. Each level compacts its own child while
   * unwinding, so a merge below can leave a parent that is compacted next.
   */
  private removeBelow(parent: RadixNode, text: string, pos: number): boolean {
    const key = text[pos];
    const child = parent.children.get(key);
    if (!child || !text.startsWith(child.label, pos)) return false;

    const next = pos + child.label.length;
    if (next === text.length) {
      if (!child.terminal) return false;
      child.terminal = false;
    } else if (!this.removeBelow(child, text, next)) {
      return false;
    }

    this.compact(parent, key, child);
    return true;
  }

  private compact(parent: RadixNode, key: string, node: RadixNode): void {
    if (node.terminal || node.children.size > 1) return;

    if (node.children.size === 0) {
      parent.children.delete(key);
      this._nodeCount--;
      return;
    }

    // Single child — absorb it into this edge
    const [only] = node.children.values();
    node.label += only.label;
    node.terminal = only.terminal;
    node.children = only.children;
    this._nodeCount--;
  }

  /** Remove every word. */
  clear(): void {
    this.root.children.clear();
    this.root.terminal = false;
    this._size = 0;
    this._nodeCount = 1;
    this.check();
  }

  /**
   * Suffixes that complete `prefix` to a stored word, in depth-first order.
   * The prefix itself is never listed, even when it is a stored word.
   */
  complete(prefix: string): string[] {
    const landing = this.descend(this.toKey(prefix), true);
    if (!landing) return [];

    const results: string[] = [];
    collectSuffixes(landing.node, landing.rest, results);
    return results;
  }

  /** All stored words, in depth-first order. */
  words(): string[] {
    const results: string[] = [];
    renderList(this.root, (line) => results.push(line));
    return results;
  }

  /**
   * Write the trie to `write`, one line at a time.
   * "list" writes every stored word, "tree" writes every node with its depth.
   */
  render(mode: string, write: LineWriter): void {
    renderTrie(this.root, mode, write);
  }

  /** Total number of stored words. */
  get size(): number {
    return this._size;
  }

  /** Total number of nodes (including root). */
  get nodeCount(): number {
    return this._nodeCount;
  }

  /** Get compression stats. */
  get stats(): RadixTrieStats {
    let totalEdgeChars = 0;
    const walk = (node: RadixNode) => {
      for (const child of node.children.values()) {
        totalEdgeChars += child.label.length;
        walk(child);
      }
    };
    walk(this.root);

    return {
      entryCount: this._size,
      nodeCount: this._nodeCount,
      totalEdgeChars,
    };
  }

  private check(): void {
    if (this.verify) {
      assertInvariants(this.root, { size: this._size, nodeCount: this._nodeCount });
    }
  }

  /** The form in which `text` is stored and listed (lower-cased unless case sensitive). */
  toKey(text: string): string {
    return this.caseSensitive ? text : text.toLowerCase();
  }

  /** Build from a list of strings. */
  static fromStrings(strings: Iterable<string>, options?: RadixTrieOptions): RadixTrie {
    const trie = new RadixTrie(options);
    for (const s of strings) trie.insert(s);
    return trie;
  }
}
