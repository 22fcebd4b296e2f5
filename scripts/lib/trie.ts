interface TrieNode<T> {
  children: Map<string, TrieNode<T>>;
  entry?: { value: T };
}

export interface PrefixMatch<T> {
  matched: string;
  value: T;
  /** UTF-16 length of `matched`, usable with `String.prototype.slice`. */
  length: number;
}

export interface OffsetMatch<T> extends PrefixMatch<T> {
  offset: number;
}

function createNode<T>(): TrieNode<T> {
  return { children: new Map() };
}

/**
 * Character-keyed prefix tree. Keys are walked per code point, so a match
 * never ends inside a surrogate pair.
 */
export class Trie<T> {
  private readonly root: TrieNode<T> = createNode();

  insert(word: string, value: T): void {
    let node = this.root;
    for (const ch of word) {
      let child = node.children.get(ch);
      if (!child) {
        child = createNode();
        node.children.set(ch, child);
      }
      node = child;
    }
    node.entry = { value };
  }

  get(word: string): T | undefined {
    let node: TrieNode<T> | undefined = this.root;
    for (const ch of word) {
      node = node.children.get(ch);
      if (!node) {
        return undefined;
      }
    }
    return node.entry?.value;
  }

  has(word: string): boolean {
    return this.get(word) !== undefined;
  }

  /**
   * Longest registered key that `text` starts with. Walking continues past
   * shorter hits for as long as the tree has a child for the next character.
   */
  findLongestPrefix(text: string): PrefixMatch<T> | undefined {
    let node = this.root;
    let length = 0;
    let best: PrefixMatch<T> | undefined;

    for (const ch of text) {
      const child = node.children.get(ch);
      if (!child) {
        break;
      }

      node = child;
      length += ch.length;
      if (node.entry) {
        best = {
          matched: text.slice(0, length),
          value: node.entry.value,
          length
        };
      }
    }

    return best;
  }

  findAll(text: string): Array<OffsetMatch<T>> {
    const matches: Array<OffsetMatch<T>> = [];
    let offset = 0;

    for (const ch of text) {
      const match = this.findLongestPrefix(text.slice(offset));
      if (match) {
        matches.push({ ...match, offset });
      }
      offset += ch.length;
    }

    return matches;
  }
}
