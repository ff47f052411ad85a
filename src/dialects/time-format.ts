/**
 * A character trie over the keys of a time mapping.
 *
 * Each node maps the next character to its child; `key` is set on nodes that
 * terminate a complete mapping key.
 */
type TrieNode = {
  children: Map<string, TrieNode>;
  key?: string;
};

export type TimeMapping = Readonly<Record<string, string>>;

const trieCache = new WeakMap<TimeMapping, TrieNode>();

function buildTrie(mapping: TimeMapping): TrieNode {
  const root: TrieNode = { children: new Map() };

  for (const key of Object.keys(mapping)) {
    let node = root;
    for (const char of key) {
      let child = node.children.get(char);
      if (!child) {
        child = { children: new Map() };
        node.children.set(char, child);
      }
      node = child;
    }
    node.key = key;
  }

  return root;
}

function trieFor(mapping: TimeMapping): TrieNode {
  let trie = trieCache.get(mapping);
  if (!trie) {
    trie = buildTrie(mapping);
    trieCache.set(mapping, trie);
  }
  return trie;
}

/**
 * Finds the longest mapping key that starts at `start`.
 *
 * @returns The matched key, or `undefined` when no key starts there.
 */
function longestMatch(
  trie: TrieNode,
  text: string,
  start: number
): string | undefined {
  let node: TrieNode | undefined = trie;
  let match: string | undefined;

  for (let index = start; index < text.length && node; index += 1) {
    node = node.children.get(text.charAt(index));
    if (node?.key !== undefined) match = node.key;
  }

  return match;
}

/**
 * Rewrites a time-format string through a token mapping.
 *
 * Scanning is left to right with longest-match semantics: at each position
 * the longest mapping key starting there is replaced by its value; characters
 * that start no key are copied unchanged.
 *
 * Longest match matters for overlapping tokens (`MM` vs `M`, `%H:%M:%S` vs
 * `%H`): a shorter key never splits a longer one.
 *
 * @param format
 *   The format string to rewrite, e.g. `'yyyy-MM-dd'`.
 * @param mapping
 *   Token mapping; a dialect's `timeMapping` converts dialect notation to
 *   canonical strftime, its `inverseTimeMapping` converts back.
 * @returns
 *   The rewritten format.
 *
 * @example
 * ```ts
 * formatTime('yyyy-MM-dd', getDialect('spark').timeMapping); // '%Y-%m-%d'
 * ```
 */
export function formatTime(format: string, mapping: TimeMapping): string {
  if (Object.keys(mapping).length === 0) return format;

  const trie = trieFor(mapping);
  let output = '';
  let index = 0;

  while (index < format.length) {
    const key = longestMatch(trie, format, index);
    if (key === undefined) {
      output += format.charAt(index);
      index += 1;
      continue;
    }
    output += mapping[key];
    index += key.length;
  }

  return output;
}

/**
 * Inverts a time mapping (values become keys).
 *
 * When several keys map to the same value, the key listed last wins; dialect
 * tables list their preferred rendering last.
 */
export function invertTimeMapping(mapping: TimeMapping): TimeMapping {
  const inverse: Record<string, string> = {};
  for (const [key, value] of Object.entries(mapping)) {
    inverse[value] = key;
  }
  return inverse;
}
