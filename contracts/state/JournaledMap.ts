/** Anything that can remember how to undo a write. */
export interface Journal {
  record(undo: () => void): void;
}

/**
 * Map whose writes are recorded on a journal so a failed transaction can
 * restore the previous contents. Missing keys read as `defaultValue`.
 */
export class JournaledMap<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(
    private readonly journal: Journal,
    private readonly defaultValue: V,
  ) {}

  get(key: K): V {
    const value = this.entries.get(key);
    return value === undefined ? this.defaultValue : value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    const previous = this.entries.get(key);
    this.entries.set(key, value);
    this.journal.record(() => {
      if (previous === undefined) {
        this.entries.delete(key);
      } else {
        this.entries.set(key, previous);
      }
    });
  }

  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  values(): V[] {
    return Array.from(this.entries.values());
  }
}

/** Single journaled slot. */
export class JournaledValue<V> {
  private readonly slot: JournaledMap<'value', V>;

  constructor(journal: Journal, initial: V) {
    this.slot = new JournaledMap<'value', V>(journal, initial);
  }

  get(): V {
    return this.slot.get('value');
  }

  set(value: V): void {
    this.slot.set('value', value);
  }
}
