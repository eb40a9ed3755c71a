import type { Logger } from './logger.js';

/**
 * Placeholder issued while a value is being built. `handle` stands in for the
 * value and starts delegating once `install` has been called.
 */
export interface Forward<V> {
  readonly handle: V;
  install(value: V): void;
}

type Entry<V> = { state: 'pending'; forward: Forward<V> } | { state: 'resolved'; value: V };

export interface RegistryOptions<V> {
  /** Label used in log entries, e.g. 'codec'. */
  label: string;
  createForward(name: string): Forward<V>;
  logger?: Logger;
}

/**
 * Lazily populated map from type name to a built value (a codec or a type
 * constructor).
 *
 * Every `resolve` runs to completion before another one starts, so the
 * check for an entry and the insertion of its placeholder cannot interleave
 * with another resolution of the same name, and no lock is held while
 * `build` recurses.
 */
export class Registry<V> {
  readonly #entries = new Map<string, Entry<V>>();
  /** Handles issued by failed builds, still referenced by whatever was built meanwhile. */
  readonly #orphans = new Map<string, Forward<V>[]>();
  readonly #options: RegistryOptions<V>;

  constructor(options: RegistryOptions<V>) {
    this.#options = options;
  }

  get size(): number {
    return this.#entries.size;
  }

  has(name: string): boolean {
    return this.#entries.get(name)?.state === 'resolved';
  }

  isPending(name: string): boolean {
    return this.#entries.get(name)?.state === 'pending';
  }

  get(name: string): V | undefined {
    const entry = this.#entries.get(name);
    return entry?.state === 'resolved' ? entry.value : undefined;
  }

  /**
   * Install `value` for `name`, replacing any earlier registration.
   */
  register(name: string, value: V): void {
    const entry = this.#entries.get(name);
    if (entry?.state === 'pending') {
      entry.forward.install(value);
    }
    this.#adoptOrphans(name, value);
    this.#entries.set(name, { state: 'resolved', value });
    this.#options.logger?.debug({ type: name, registry: this.#options.label }, 'registered');
  }

  /**
   * Return the value for `name`, building it with `build` on first request.
   * A request for `name` made while it is being built receives the
   * placeholder's handle. If `build` throws, the placeholder is removed and
   * the error propagates; its handle starts delegating once a later attempt
   * succeeds.
   */
  resolve(name: string, build: () => V): V {
    const entry = this.#entries.get(name);
    if (entry?.state === 'resolved') return entry.value;
    if (entry?.state === 'pending') {
      this.#options.logger?.debug({ type: name, registry: this.#options.label }, 'forward reference issued');
      return entry.forward.handle;
    }

    const forward = this.#options.createForward(name);
    this.#entries.set(name, { state: 'pending', forward });

    let value: V;
    try {
      value = build();
    } catch (err) {
      if (this.#entries.get(name)?.state === 'pending') {
        this.#entries.delete(name);
        const orphans = this.#orphans.get(name) ?? [];
        orphans.push(forward);
        this.#orphans.set(name, orphans);
      }
      throw err;
    }

    const current = this.#entries.get(name);
    if (current?.state === 'resolved') {
      // Registered explicitly while building; the registration wins.
      forward.install(current.value);
      this.#adoptOrphans(name, current.value);
      return current.value;
    }
    forward.install(value);
    this.#adoptOrphans(name, value);
    this.#entries.set(name, { state: 'resolved', value });
    this.#options.logger?.debug({ type: name, registry: this.#options.label }, 'built');
    return value;
  }

  clear(): void {
    this.#entries.clear();
    this.#orphans.clear();
  }

  #adoptOrphans(name: string, value: V): void {
    const orphans = this.#orphans.get(name);
    if (!orphans) return;
    this.#orphans.delete(name);
    for (const orphan of orphans) {
      orphan.install(value);
    }
  }
}
