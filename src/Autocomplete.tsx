/**
 * TrieAutocomplete — a React combobox that completes typed text from a
 * radix trie.
 *
 * The listbox shows `suggest()` for the current text, and a status line says
 * whether that text is a stored word, a prefix of one, or neither.
 */

import { useMemo, useReducer, type KeyboardEvent, type ReactNode } from 'react';
import { RadixTrie, type LookupResult } from './radix';

// ─── Types ──────────────────────────────────────────────────────────

export interface TrieAutocompleteProps {
  /** Trie to complete from. Takes priority over `items`. */
  trie?: RadixTrie;
  /** Words to build a trie from when no `trie` is given. */
  items?: string[];

  defaultValue?: string;
  /** Called with the text after every edit or selection. */
  onChange?: (value: string) => void;
  /** Called with the chosen word. */
  onSelect?: (word: string) => void;

  /** Default 8. */
  maxSuggestions?: number;
  /** Characters needed before anything is suggested. Default 1. */
  minChars?: number;

  /** Option content; by default the typed part is wrapped in `<mark>`. */
  renderSuggestion?: (word: string, query: string) => ReactNode;

  placeholder?: string;
  /** Base for the input, listbox and option element ids. */
  id?: string;
  className?: string;
  disabled?: boolean;
}

interface ComboState {
  query: string;
  open: boolean;
  /** Index of the highlighted option, -1 for none. */
  active: number;
}

type ComboAction =
  | { type: 'input'; query: string }
  | { type: 'step'; by: 1 | -1; count: number }
  | { type: 'commit'; word: string }
  | { type: 'close' };

const STATUS_TEXT: Record<LookupResult, string> = {
  word: 'stored word',
  prefix: 'prefix of a stored word',
  none: 'no match',
};

// ─── Suggestions ────────────────────────────────────────────────────

/**
 * Stored words to offer for `query`: the query itself when stored, then
 * its completions, shortest first. Words come back in the trie's key form,
 * so a case-insensitive trie suggests lower-cased words.
 */
export function suggest(trie: RadixTrie, query: string, limit: number): string[] {
  const key = trie.toKey(query);
  const completions = trie
    .complete(key)
    .map((suffix) => key + suffix)
    .sort((a, b) => a.length - b.length || a.localeCompare(b));

  const words = trie.has(key) ? [key, ...completions] : completions;
  return words.slice(0, limit);
}

// ─── State ──────────────────────────────────────────────────────────

function reduce(state: ComboState, action: ComboAction): ComboState {
  switch (action.type) {
    case 'input':
      return { query: action.query, open: true, active: -1 };
    case 'step': {
      if (action.count === 0) return state;
      const from = state.open ? state.active : -1;
      // Stepping back from "nothing highlighted" lands on the last option
      const active =
        from < 0 && action.by < 0 ? action.count - 1 : (from + action.by + action.count) % action.count;
      return { ...state, open: true, active };
    }
    case 'commit':
      return { query: action.word, open: false, active: -1 };
    case 'close':
      return { ...state, open: false, active: -1 };
  }
}

// ─── Component ──────────────────────────────────────────────────────

export function TrieAutocomplete({
  trie: givenTrie,
  items,
  defaultValue = '',
  onChange,
  onSelect,
  maxSuggestions = 8,
  minChars = 1,
  renderSuggestion,
  placeholder = 'Search...',
  id = 'trie-autocomplete',
  className,
  disabled = false,
}: TrieAutocompleteProps) {
  const trie = useMemo(() => givenTrie ?? RadixTrie.fromStrings(items ?? []), [givenTrie, items]);
  const [state, dispatch] = useReducer(reduce, { query: defaultValue, open: false, active: -1 });

  const ready = state.query.length >= minChars;
  const suggestions = useMemo(
    () => (ready ? suggest(trie, state.query, maxSuggestions) : []),
    [trie, state.query, maxSuggestions, ready],
  );
  const status = ready ? trie.lookup(state.query, true) : null;

  const expanded = state.open && suggestions.length > 0;
  const active = state.active < suggestions.length ? state.active : -1;
  const listId = `${id}-listbox`;
  const optionId = (index: number) => `${id}-option-${index}`;

  // Options commit on mousedown, before the input's blur closes the list
  const commit = (word: string) => {
    dispatch({ type: 'commit', word });
    onChange?.(word);
    onSelect?.(word);
  };

  const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>) => {
    switch (e.key) {
      case 'ArrowDown':
      case 'ArrowUp':
        e.preventDefault();
        dispatch({ type: 'step', by: e.key === 'ArrowDown' ? 1 : -1, count: suggestions.length });
        break;
      case 'Enter':
        if (expanded && active >= 0) {
          e.preventDefault();
          commit(suggestions[active]);
        }
        break;
      case 'Escape':
        dispatch({ type: 'close' });
        break;
    }
  };

  return (
    <div className={className}>
      <input
        id={id}
        type="text"
        role="combobox"
        aria-autocomplete="list"
        aria-expanded={expanded}
        aria-controls={listId}
        aria-activedescendant={expanded && active >= 0 ? optionId(active) : undefined}
        value={state.query}
        placeholder={placeholder}
        disabled={disabled}
        autoComplete="off"
        onChange={(e) => {
          dispatch({ type: 'input', query: e.target.value });
          onChange?.(e.target.value);
        }}
        onKeyDown={handleKeyDown}
        onBlur={() => dispatch({ type: 'close' })}
      />

      {expanded && (
        <ul id={listId} role="listbox">
          {suggestions.map((word, i) => (
            <li
              key={word}
              id={optionId(i)}
              role="option"
              aria-selected={i === active}
              onMouseDown={(e) => {
                e.preventDefault();
                commit(word);
              }}
            >
              {renderSuggestion ? (
                renderSuggestion(word, state.query)
              ) : (
                <>
                  <mark>{word.slice(0, state.query.length)}</mark>
                  {word.slice(state.query.length)}
                </>
              )}
            </li>
          ))}
        </ul>
      )}

      {status && (
        <p role="status" data-lookup={status}>
          {STATUS_TEXT[status]}
        </p>
      )}
    </div>
  );
}
