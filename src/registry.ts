import { logger } from "./logger.js";

/**
 * Name-keyed store behind the profile and tool registries.
 * Entries keep registration order; a second registration under the same name replaces the first.
 */
export class Registry<T> {
  private readonly entries = new Map<string, T>();

  constructor(
    private readonly kind: string,
    private readonly nameOf: (entry: T) => string,
  ) {}

  register(entry: T): void {
    const name = this.nameOf(entry);
    if (this.entries.has(name)) {
      logger.warn({ [this.kind]: name }, `Duplicate ${this.kind} registration - overwriting`);
    }
    this.entries.set(name, entry);
  }

  get(name: string): T | undefined {
    return this.entries.get(name);
  }

  getAll(): T[] {
    return [...this.entries.values()];
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }
}
