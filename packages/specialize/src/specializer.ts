import { Trie } from "@hetero/trie";

// Produces one implementation per distinct key, where a key is a fixed path
// of values describing the shape of the inputs an implementation handles.
// Callers must treat specialize as pure: the same key always yields the same
// implementation.
export interface Specializer<TKey extends readonly unknown[], TImpl> {
  specialize(key: TKey): TImpl;
  // Number of implementations built so far.
  readonly size: number;
}

type Node<TImpl> = { built?: { impl: TImpl } };

export class TrieSpecializer<
  TKey extends readonly unknown[],
  TImpl,
> implements Specializer<TKey, TImpl> {
  private trie: Trie<Node<TImpl>>;
  private count = 0;

  constructor(
    private readonly build: (key: TKey) => TImpl,
    // Passed through to the Trie, so object keys (such as interned Shape
    // objects) do not keep their specializations alive.
    weakness = true,
  ) {
    this.trie = new Trie<Node<TImpl>>(weakness);
  }

  public get size(): number {
    return this.count;
  }

  public specialize(key: TKey): TImpl {
    const node = this.trie.lookupArray(key);
    if (!node.built) {
      node.built = { impl: this.build(key) };
      ++this.count;
    }
    return node.built.impl;
  }

  public has(key: TKey): boolean {
    const node = this.trie.peekArray(key);
    return !!(node && node.built);
  }
}
