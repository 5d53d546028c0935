import { LoadBalancerAdapter } from "./types";

export type PoolServer = {
  url: string;
  weight: number;
};

/**
 * In-memory live server list with weighted round-robin selection.
 * Each server is handed out `weight` times in a row before moving on.
 */
export class ServerPool implements LoadBalancerAdapter {
  constructor(servers: Array<string | PoolServer> = []) {
    this.entries = [];
    this.currentIndex = 0;
    this.served = 0;
    servers.forEach((server) =>
      typeof server === "string"
        ? this.upsertServer(server, 1)
        : this.upsertServer(server.url, server.weight)
    );
  }

  private entries: PoolServer[];
  private currentIndex: number;
  private served: number;

  servers(): string[] {
    return this.entries.map((entry) => entry.url);
  }

  getServers(): PoolServer[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  upsertServer(url: string, weight: number): void {
    if (!Number.isInteger(weight) || weight < 1) {
      throw new Error(`Invalid weight ${weight} for ${url}`);
    }

    const existing = this.entries.find((entry) => entry.url === url);
    if (existing) {
      existing.weight = weight;
      return;
    }
    this.entries.push({ url, weight });
  }

  removeServer(url: string): void {
    const index = this.entries.findIndex((entry) => entry.url === url);
    if (index === -1) return;

    this.entries.splice(index, 1);
    if (index < this.currentIndex) {
      this.currentIndex -= 1;
    } else if (index === this.currentIndex) {
      this.served = 0;
    }
  }

  selectServer(): string | null {
    if (this.entries.length === 0) return null;
    if (this.currentIndex >= this.entries.length) {
      this.currentIndex = 0;
      this.served = 0;
    }

    const entry = this.entries[this.currentIndex];
    this.served += 1;
    if (this.served >= entry.weight) {
      this.served = 0;
      this.currentIndex = (this.currentIndex + 1) % this.entries.length;
    }
    return entry.url;
  }
}
