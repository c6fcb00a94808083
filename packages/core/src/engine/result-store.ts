// packages/core/src/engine/result-store.ts

/**
 * Captured stdout keyed by output label, scoped to one workflow run.
 */
export class ResultStore {
  private results = new Map<string, string>();
  private overwritten = new Set<string>();

  set(label: string, output: string): void {
    if (this.results.has(label)) this.overwritten.add(label);
    this.results.set(label, output);
  }

  get(label: string): string | undefined {
    return this.results.get(label);
  }

  has(label: string): boolean {
    return this.results.has(label);
  }

  labels(): string[] {
    return [...this.results.keys()];
  }

  /** Labels written more than once during the current run. */
  overwrittenLabels(): string[] {
    return [...this.overwritten];
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.results);
  }

  clear(): void {
    this.results.clear();
    this.overwritten.clear();
  }
}
