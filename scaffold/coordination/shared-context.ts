export type ContextRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is ContextRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Process-wide key/value store shared by the orchestrator components.
 *
 * Every operation completes synchronously, so a read-modify-write such as
 * `update` can never interleave with another caller on the event loop. Values
 * are copied on the way in and on the way out.
 */
export class SharedContext {
  private data = new Map<string, unknown>();

  set(key: string, value: unknown): void {
    this.data.set(key, structuredClone(value));
  }

  get(key: string): unknown {
    return this.data.has(key) ? structuredClone(this.data.get(key)) : undefined;
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  /**
   * Shallow-merge `patch` into the record stored at `key`, creating it when
   * absent. A non-record value at `key` is replaced by the patch.
   */
  update(key: string, patch: ContextRecord): ContextRecord {
    const current = this.data.get(key);
    const next: ContextRecord = isRecord(current)
      ? { ...current, ...structuredClone(patch) }
      : structuredClone(patch);
    this.data.set(key, next);
    return structuredClone(next);
  }

  delete(key: string): boolean {
    return this.data.delete(key);
  }

  keys(prefix?: string): string[] {
    const keys = Array.from(this.data.keys());
    return prefix ? keys.filter((key) => key.startsWith(prefix)) : keys;
  }

  snapshot(): Record<string, unknown> {
    const copy: Record<string, unknown> = {};
    for (const [key, value] of this.data) {
      copy[key] = structuredClone(value);
    }
    return copy;
  }
}
