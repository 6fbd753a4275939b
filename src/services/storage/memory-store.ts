/**
 * In-memory TextStore
 */

import type { TextStore } from './text-store.js';

export class MemoryTextStore implements TextStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, string>();

  async get(identifier: string): Promise<string | null> {
    return this.entries.get(identifier) ?? null;
  }

  async put(identifier: string, text: string): Promise<void> {
    this.entries.set(identifier, text);
  }

  locate(): string | null {
    return null;
  }

  get size(): number {
    return this.entries.size;
  }

  close(): void {
    this.entries.clear();
  }
}
