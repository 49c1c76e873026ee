// @vitest-environment jsdom
import { afterEach, describe, test, expect, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { TrieAutocomplete, suggest } from './Autocomplete';
import { RadixTrie } from './radix';

const ITEMS = ['car', 'cart', 'carton', 'carve', 'dog'];

afterEach(() => {
  cleanup();
});

function optionTexts(): string[] {
  return screen.getAllByRole('option').map((option) => option.textContent ?? '');
}

describe('suggest', () => {
  const trie = RadixTrie.fromStrings(ITEMS);

  test('puts a stored query first, then completions shortest first', () => {
    expect(suggest(trie, 'car', 8)).toEqual(['car', 'cart', 'carve', 'carton']);
  });

  test('completes a query that ends inside an edge', () => {
    expect(suggest(trie, 'ca', 8)).toEqual(['car', 'cart', 'carve', 'carton']);
  });

  test('respects the limit', () => {
    expect(suggest(trie, 'car', 2)).toEqual(['car', 'cart']);
    expect(suggest(trie, 'x', 8)).toEqual([]);
  });

  test('suggests stored keys when the trie ignores case', () => {
    const folded = RadixTrie.fromStrings(['car', 'cart'], { caseSensitive: false });
    const words = suggest(folded, 'Car', 8);
    expect(words).toEqual(['car', 'cart']);
    for (const word of words) expect(folded.words()).toContain(word);
  });
});

describe('TrieAutocomplete', () => {
  test('shows completions and the lookup status for typed text', () => {
    render(<TrieAutocomplete items={ITEMS} />);
    const input = screen.getByRole('combobox');

    fireEvent.change(input, { target: { value: 'car' } });

    expect(input.getAttribute('aria-expanded')).toBe('true');
    expect(optionTexts()).toEqual(['car', 'cart', 'carve', 'carton']);
    expect(screen.getByRole('status').textContent).toBe('stored word');

    fireEvent.change(input, { target: { value: 'ca' } });
    expect(screen.getByRole('status').textContent).toBe('prefix of a stored word');
  });

  test('reports no match and hides the list', () => {
    render(<TrieAutocomplete items={ITEMS} />);
    const input = screen.getByRole('combobox');

    fireEvent.change(input, { target: { value: 'cat' } });

    expect(screen.queryByRole('listbox')).toBeNull();
    expect(screen.getByRole('status').textContent).toBe('no match');
  });

  test('selects the highlighted suggestion with the keyboard', () => {
    const onSelect = vi.fn();
    render(<TrieAutocomplete items={ITEMS} onSelect={onSelect} />);
    const input = screen.getByRole<HTMLInputElement>('combobox');

    fireEvent.change(input, { target: { value: 'car' } });
    fireEvent.keyDown(input, { key: 'ArrowDown' });
    fireEvent.keyDown(input, { key: 'ArrowDown' });
    expect(input.getAttribute('aria-activedescendant')).toBe('trie-autocomplete-option-1');
    fireEvent.keyDown(input, { key: 'Enter' });

    expect(onSelect).toHaveBeenCalledWith('cart');
    expect(input.value).toBe('cart');
    expect(screen.queryByRole('listbox')).toBeNull();
  });

  test('ArrowUp from no highlight wraps to the last suggestion', () => {
    render(<TrieAutocomplete items={ITEMS} />);
    const input = screen.getByRole('combobox');

    fireEvent.change(input, { target: { value: 'car' } });
    fireEvent.keyDown(input, { key: 'ArrowUp' });

    const options = screen.getAllByRole('option');
    expect(options[3].getAttribute('aria-selected')).toBe('true');
    expect(options[0].getAttribute('aria-selected')).toBe('false');
  });

  test('selects a suggestion with the mouse', () => {
    const onChange = vi.fn();
    render(<TrieAutocomplete items={ITEMS} onChange={onChange} />);
    const input = screen.getByRole<HTMLInputElement>('combobox');

    fireEvent.change(input, { target: { value: 'do' } });
    fireEvent.mouseDown(screen.getByRole('option'));

    expect(onChange).toHaveBeenNthCalledWith(1, 'do');
    expect(onChange).toHaveBeenNthCalledWith(2, 'dog');
    expect(input.value).toBe('dog');
  });

  test('Escape closes the list', () => {
    render(<TrieAutocomplete items={ITEMS} />);
    const input = screen.getByRole('combobox');

    fireEvent.change(input, { target: { value: 'do' } });
    expect(optionTexts()).toEqual(['dog']);

    fireEvent.keyDown(input, { key: 'Escape' });
    expect(screen.queryByRole('listbox')).toBeNull();
  });

  test('waits for minChars before suggesting', () => {
    render(<TrieAutocomplete items={ITEMS} minChars={2} />);
    const input = screen.getByRole('combobox');

    fireEvent.change(input, { target: { value: 'c' } });
    expect(screen.queryByRole('listbox')).toBeNull();
    expect(screen.queryByRole('status')).toBeNull();

    fireEvent.change(input, { target: { value: 'ca' } });
    expect(optionTexts()).toEqual(['car', 'cart', 'carve', 'carton']);
  });

  test('uses a provided trie and limit', () => {
    const trie = RadixTrie.fromStrings(['apple', 'applied', 'apply']);
    render(<TrieAutocomplete trie={trie} maxSuggestions={2} />);

    fireEvent.change(screen.getByRole('combobox'), { target: { value: 'appl' } });

    expect(optionTexts()).toEqual(['apple', 'apply']);
  });
});
