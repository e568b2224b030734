import type { RateWindow, RateWindowStore } from "./store.js";

export class InMemoryRateWindowStore implements RateWindowStore {
  private windows = new Map<string, RateWindow>();

  get(key: string): RateWindow | undefined {
    const window = this.windows.get(key);
    return window ? { ...window } : undefined;
  }

  set(key: string, window: RateWindow): void {
    this.windows.set(key, { ...window });
  }

  delete(key: string): void {
    this.windows.delete(key);
  }

  clear(): void {
    this.windows.clear();
  }
}
