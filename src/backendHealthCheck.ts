import {
  BackendHealthCheckOptions,
  parseBackendHealthCheckOptions,
  ResolvedBackendHealthCheckOptions,
} from "./config";
import { errorMessage, Logger } from "./logger";
import { probeServer } from "./probe";
import { BackendStatus, LoadBalancerAdapter, Probe, ProbeResult } from "./types";

export const DEFAULT_WEIGHT = 1;

/**
 * Health check state of one backend: its validated options and the servers
 * currently held out of the load balancer because their last probe failed.
 *
 * The disabled list belongs to the single monitor task running this backend.
 */
export class BackendHealthCheck {
  readonly name: string;
  private readonly options: ResolvedBackendHealthCheckOptions;
  private readonly probe: Probe;
  private disabledUrls: string[];
  private running: Promise<void> | null;

  constructor(
    name: string,
    options: BackendHealthCheckOptions,
    probe: Probe = probeServer
  ) {
    this.name = name;
    this.options = parseBackendHealthCheckOptions(options, name);
    this.probe = probe;
    this.disabledUrls = [];
    this.running = null;
  }

  get path(): string {
    return this.options.path;
  }

  get interval(): number {
    return this.options.interval;
  }

  get timeout(): number {
    return this.options.timeout;
  }

  get lb(): LoadBalancerAdapter {
    return this.options.lb;
  }

  disabledServers(): string[] {
    return [...this.disabledUrls];
  }

  status(): BackendStatus {
    return {
      name: this.name,
      path: this.path,
      interval: this.interval,
      timeout: this.timeout,
      disabledServers: this.disabledServers(),
    };
  }

  toString(): string {
    return `[Path: ${this.path} Interval: ${this.interval}ms Timeout: ${this.timeout}ms]`;
  }

  /**
   * One reconciliation pass. Disabled servers are probed first and put back
   * when healthy; then every server of the live list read at the start of the
   * pass is probed and pulled out when unhealthy.
   */
  async check(logger: Logger): Promise<void> {
    const enabledUrls = await this.lb.servers();

    const stillDisabled: string[] = [];
    for (const url of this.disabledUrls) {
      if (stillDisabled.includes(url)) continue;

      const result = await this.probeSafely(url);
      if (result.healthy) {
        logger.debug(`Health check is up [${url}]: upsert in server list`);
        const restored = await this.mutate(logger, "upsert", url, () =>
          this.lb.upsertServer(url, DEFAULT_WEIGHT)
        );
        // Retry the upsert on the next pass
        if (!restored) stillDisabled.push(url);
      } else {
        logger.warn(`Health check is still failing [${url}]`, {
          status: result.status,
          error: result.error,
        });
        stillDisabled.push(url);
      }
    }
    this.disabledUrls = stillDisabled;

    for (const url of enabledUrls) {
      if (this.disabledUrls.includes(url)) {
        // Already disabled: either it failed above or an earlier removal failed
        await this.mutate(logger, "remove", url, () =>
          this.lb.removeServer(url)
        );
        continue;
      }

      const result = await this.probeSafely(url);
      if (!result.healthy) {
        logger.warn(`Health check has failed [${url}]: remove from server list`, {
          status: result.status,
          error: result.error,
        });
        await this.mutate(logger, "remove", url, () =>
          this.lb.removeServer(url)
        );
        this.disabledUrls.push(url);
      }
    }
  }

  /**
   * Runs `monitor` once every monitor started earlier on this backend has
   * exited, so only one task at a time owns the disabled list.
   */
  exclusive(monitor: () => Promise<void>): Promise<void> {
    const previous = this.running;
    const task = previous ? previous.then(monitor, monitor) : monitor();
    const tracked = task.finally(() => {
      if (this.running === tracked) this.running = null;
    });
    this.running = tracked;
    return tracked;
  }

  private async probeSafely(url: string): Promise<ProbeResult> {
    try {
      return await this.probe(url, this.path, this.timeout);
    } catch (error) {
      return { healthy: false, error: errorMessage(error) };
    }
  }

  private async mutate(
    logger: Logger,
    action: "upsert" | "remove",
    url: string,
    call: () => void | Promise<void>
  ): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (error) {
      logger.warn(`Failed to ${action} server [${url}]`, {
        error: errorMessage(error),
      });
      return false;
    }
  }
}

/**
 * Resolves true when the next tick fires, false once `signal` is aborted.
 * An abort always wins over a tick that is due at the same time.
 */
function waitForTick(delay: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(!signal.aborted);
    }, delay);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Monitor loop of one backend: an immediate pass, then one pass per interval
 * until `signal` is aborted. Ticks missed while a pass runs are dropped.
 * A monitor still finishing its pass on the same backend is awaited first.
 * Never rejects.
 */
export function runBackendHealthCheck(
  backend: BackendHealthCheck,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  return backend.exclusive(() => monitor(backend, signal, logger));
}

async function monitor(
  backend: BackendHealthCheck,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  if (signal.aborted) return;

  const pass = async () => {
    try {
      await backend.check(logger);
    } catch (error) {
      logger.error("Health check pass failed", { error: errorMessage(error) });
    }
  };

  logger.debug(`Initial health check for backend ${backend.name}`, {
    options: backend.toString(),
  });
  await pass();

  let nextTick = Date.now() + backend.interval;
  for (;;) {
    const ticked = await waitForTick(
      Math.max(0, nextTick - Date.now()),
      signal
    );
    if (!ticked) {
      logger.debug(`Stopping health check for backend ${backend.name}`);
      return;
    }

    const now = Date.now();
    while (nextTick <= now) nextTick += backend.interval;

    logger.debug(`Refreshing health check for backend ${backend.name}`);
    await pass();
  }
}
