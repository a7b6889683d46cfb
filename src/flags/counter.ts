import type { Acceptor } from './flag-set.js'

/**
 * Acceptor that reports each set before delegating to the wrapped acceptor.
 */
export class CountingAcceptor implements Acceptor {
  constructor(
    private readonly inner: Acceptor,
    private readonly onSet: () => void
  ) {}

  get field(): string {
    return this.inner.field
  }

  get boolean(): boolean {
    return this.inner.boolean
  }

  set(text: string): void {
    this.onSet()
    this.inner.set(text)
  }
}

/**
 * Counts flag occurrences under their canonical names.
 */
export class OccurrenceTracker {
  private readonly counts = new Map<string, number>()

  constructor(private readonly canonical: ReadonlyMap<string, string>) {}

  /**
   * Wrap an acceptor registered under name so its sets are counted.
   */
  wrap(name: string, acceptor: Acceptor): Acceptor {
    const key = this.canonical.get(name) ?? name
    return new CountingAcceptor(acceptor, () => {
      this.counts.set(key, (this.counts.get(key) ?? 0) + 1)
    })
  }

  /**
   * The counts so far, or undefined if no flag was set.
   */
  report(): Map<string, number> | undefined {
    return this.counts.size === 0 ? undefined : new Map(this.counts)
  }
}
