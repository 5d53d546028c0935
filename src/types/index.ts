export type MaybePromise<T> = T | Promise<T>;

/**
 * Capability surface of the load balancer that owns a backend's live server
 * list. Implementations must tolerate concurrent calls from several monitors.
 */
export interface LoadBalancerAdapter {
  /** Current live list, read fresh on every pass. */
  servers(): MaybePromise<string[]>;
  /** Adds a server, or updates its weight when it is already present. */
  upsertServer(url: string, weight: number): MaybePromise<void>;
  /** Removes a server; removing an absent server is a no-op. */
  removeServer(url: string): MaybePromise<void>;
}

export type ProbeResult = {
  healthy: boolean;
  status?: number;
  error?: string;
};

export type Probe = (
  serverUrl: string,
  path: string,
  timeout: number
) => Promise<ProbeResult>;

export type BackendStatus = {
  name: string;
  path: string;
  interval: number;
  timeout: number;
  disabledServers: string[];
};
