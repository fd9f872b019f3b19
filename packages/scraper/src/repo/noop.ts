import type { RunTracker } from "./types";

export class NoopRunTracker implements RunTracker {
  async start(): Promise<string | null> {
    return null;
  }

  async complete(): Promise<void> {}

  async fail(): Promise<void> {}
}
