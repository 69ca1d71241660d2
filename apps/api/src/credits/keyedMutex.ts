// ─── Mutex por clave (in-process) ──────────────────────────────────
// Serializa secciones criticas con la misma clave; claves distintas corren en paralelo.

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release = (): void => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Claves con trabajo pendiente (para tests/diagnostico). */
  get size(): number {
    return this.tails.size;
  }
}
