// React component
export { TrieAutocomplete, suggest } from './Autocomplete';
export type { TrieAutocompleteProps } from './Autocomplete';

// Radix trie (compressed, multi-character edges)
export { RadixTrie } from './radix';
export type {
  RadixNode,
  RadixNodeHandle,
  RadixTrieOptions,
  RadixTrieStats,
  LookupResult,
} from './radix';

// Rendering and verification
export { renderList, renderTree, renderTrie, isRenderMode, RENDER_MODES } from './render';
export type { RenderMode, LineWriter } from './render';
export { checkInvariants, assertInvariants, verifyKeys } from './verify';
export type { ExpectedCounts, KeyReport } from './verify';

// Errors
export { TrieError, InvalidRenderModeError, TrieInvariantError, UsageError } from './errors';
export type { InvariantViolation } from './errors';
