// packages/game-core/src/dictionary.ts
//
// Immutable word list backed by a prefix tree.
//
// Only the compiler needs a dictionary: the word finder walks the tree one
// letter at a time alongside its depth-first search, so a dead prefix is
// pruned as soon as it appears. Puzzles carry their own words, so the
// runtime never loads one.

export interface DictionaryNode {
  readonly isWord: boolean;
  readonly children: ReadonlyMap<string, DictionaryNode>;
}

interface MutableNode {
  isWord: boolean;
  children: Map<string, MutableNode>;
}

function createNode(): MutableNode {
  return { isWord: false, children: new Map() };
}

/**
 * Splits word-list text into entries: one per line, trimmed, skipping
 * blank lines and `#` comments.
 */
export function readWordList(text: string): string[] {
  const out: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line && !line.startsWith('#')) out.push(line);
  }
  return out;
}

export class Dictionary {
  private constructor(
    private readonly rootNode: MutableNode,
    /** Number of distinct words. */
    readonly size: number,
  ) {}

  static fromWords(words: Iterable<string>): Dictionary {
    const root = createNode();
    let size = 0;

    for (const word of words) {
      if (!word) continue;
      let node = root;
      for (const letter of word) {
        let child = node.children.get(letter);
        if (!child) {
          child = createNode();
          node.children.set(letter, child);
        }
        node = child;
      }
      if (!node.isWord) {
        node.isWord = true;
        size++;
      }
    }

    return new Dictionary(root, size);
  }

  /** Builds a dictionary from word-list text (see readWordList). */
  static fromText(text: string): Dictionary {
    return Dictionary.fromWords(readWordList(text));
  }

  get root(): DictionaryNode {
    return this.rootNode;
  }

  /** Node reached by spelling `prefix` from the root, if any word continues it. */
  walk(prefix: string): DictionaryNode | undefined {
    let node: DictionaryNode | undefined = this.rootNode;
    for (const letter of prefix) {
      node = node.children.get(letter);
      if (!node) return undefined;
    }
    return node;
  }

  contains(word: string): boolean {
    return word.length > 0 && (this.walk(word)?.isWord ?? false);
  }

  /** True when at least one word starts with `prefix` (or equals it). */
  hasPrefix(prefix: string): boolean {
    return this.size > 0 && this.walk(prefix) !== undefined;
  }
}
