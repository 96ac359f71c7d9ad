// A trie keyed by arrays (paths) of arbitrary values. Every distinct path owns
// exactly one data slot, created lazily by makeData the first time the path is
// looked up. Object and function keys can be held weakly, so a path that
// mentions a garbage-collectible key does not keep it alive.

// If no makeData function is supplied, the looked-up data will be an empty,
// null-prototype Object.
const defaultMakeData = () => Object.create(null);

export class Trie<Data> {
  // Both maps are allocated lazily. Data lives in a box so that undefined is a
  // legitimate Data value.
  private weak?: WeakMap<object, Trie<Data>>;
  private strong?: Map<unknown, Trie<Data>>;
  private slot?: { data: Data };

  constructor(
    private readonly weakness = true,
    private readonly makeData: (path: unknown[]) => Data = defaultMakeData,
  ) {}

  public lookup<T extends unknown[]>(...path: T): Data {
    return this.lookupArray(path);
  }

  public lookupArray(path: ArrayLike<unknown>): Data {
    let node: Trie<Data> = this;
    for (let i = 0; i < path.length; ++i) {
      node = node.child(path[i], true);
    }
    const slot = node.slot || (node.slot = {
      data: this.makeData(Array.from(path)),
    });
    return slot.data;
  }

  public peek<T extends unknown[]>(...path: T): Data | undefined {
    return this.peekArray(path);
  }

  // Like lookupArray, but never allocates nodes or data.
  public peekArray(path: ArrayLike<unknown>): Data | undefined {
    let node: Trie<Data> | undefined = this;
    for (let i = 0; node && i < path.length; ++i) {
      node = node.child(path[i], false);
    }
    return node && node.slot ? node.slot.data : void 0;
  }

  private child(key: unknown, create: true): Trie<Data>;
  private child(key: unknown, create: false): Trie<Data> | undefined;
  private child(key: unknown, create: boolean): Trie<Data> | undefined {
    if (this.weakness && isObjRef(key)) {
      const weak = this.weak || (create ? this.weak = new WeakMap : void 0);
      let child = weak && weak.get(key);
      if (weak && !child && create) {
        weak.set(key, child = new Trie<Data>(this.weakness, this.makeData));
      }
      return child;
    }
    const strong = this.strong || (create ? this.strong = new Map : void 0);
    let child = strong && strong.get(key);
    if (strong && !child && create) {
      strong.set(key, child = new Trie<Data>(this.weakness, this.makeData));
    }
    return child;
  }
}

export function isObjRef(value: unknown): value is object {
  switch (typeof value) {
  case "object":
    if (value === null) break;
    // Fall through to return true...
  case "function":
    return true;
  }
  return false;
}
