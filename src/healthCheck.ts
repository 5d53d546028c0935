import { BackendHealthCheck, runBackendHealthCheck } from "./backendHealthCheck";
import {
  ConfigurationError,
  EnvConfig,
  HealthCheckConfig,
  parseEnv,
} from "./config";
import { errorMessage, Logger } from "./logger";
import { BackendStatus, LoadBalancerAdapter, Probe } from "./types";

export type MonitoredBackends =
  | ReadonlyMap<string, BackendHealthCheck>
  | Readonly<Record<string, BackendHealthCheck>>;

export interface HealthCheckOptions {
  /** Defaults to a logger configured from LOG_LEVEL and LOG_FORMAT. */
  logger?: Logger;
}

/**
 * Holds the monitored backend set. Each call to `setBackendsConfiguration`
 * starts a new generation of monitor tasks and cancels the previous one.
 */
export class HealthCheck {
  private backends: ReadonlyMap<string, BackendHealthCheck>;
  private controller: AbortController | null;
  private readonly tasks: Set<Promise<void>>;
  private readonly logger: Logger;

  constructor(options: HealthCheckOptions = {}) {
    this.backends = new Map();
    this.controller = null;
    this.tasks = new Set();
    this.logger = options.logger ?? Logger.fromEnv(parseEnv());
  }

  /**
   * Replaces the whole monitored set. Previous monitors are only signalled to
   * stop; use `wait()` to join them.
   *
   * Runs synchronously, so two reconfigurations can never interleave.
   */
  setBackendsConfiguration(
    backends: MonitoredBackends,
    parentSignal?: AbortSignal
  ): void {
    const next = toMap(backends);
    validateBackends(next);

    this.backends = next;
    this.stop();

    const controller = new AbortController();
    this.controller = controller;
    if (parentSignal) linkSignal(parentSignal, controller);

    this.logger.debug(`Starting health checks for ${next.size} backend(s)`);
    for (const [name, backend] of next) {
      this.track(
        runBackendHealthCheck(
          backend,
          controller.signal,
          this.logger.child(name)
        )
      );
    }
  }

  /** Cancels the current generation, if any. */
  stop(): void {
    if (!this.controller) return;
    this.logger.debug("Stopping all current health check tasks");
    this.controller.abort();
    this.controller = null;
  }

  /** Resolves once every monitor started so far has exited. */
  async wait(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  getBackends(): ReadonlyMap<string, BackendHealthCheck> {
    return this.backends;
  }

  status(): BackendStatus[] {
    return [...this.backends.values()].map((backend) => backend.status());
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.logger.error("Health check task crashed", {
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }
}

function toMap(
  backends: MonitoredBackends
): ReadonlyMap<string, BackendHealthCheck> {
  return isBackendMap(backends)
    ? new Map(backends)
    : new Map(Object.entries(backends));
}

function isBackendMap(
  backends: MonitoredBackends
): backends is ReadonlyMap<string, BackendHealthCheck> {
  return backends instanceof Map;
}

function validateBackends(backends: ReadonlyMap<string, BackendHealthCheck>) {
  const issues: string[] = [];
  const owners = new Map<BackendHealthCheck, string>();

  for (const [name, backend] of backends) {
    if (!name) {
      issues.push("Backend name cannot be empty");
    }
    const owner = owners.get(backend);
    if (owner !== undefined) {
      issues.push(`${name}: health check already registered as "${owner}"`);
    }
    owners.set(backend, name);
  }

  if (issues.length) {
    throw new ConfigurationError("Invalid backend set", issues);
  }
}

function linkSignal(parent: AbortSignal, controller: AbortController) {
  if (parent.aborted) {
    controller.abort(parent.reason);
    return;
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  controller.signal.addEventListener(
    "abort",
    () => parent.removeEventListener("abort", onAbort),
    { once: true }
  );
}

/**
 * Builds the monitored set from a parsed configuration document, pairing each
 * backend with the load balancer registered under the same name.
 */
export function loadBackends(
  config: HealthCheckConfig,
  adapters: Readonly<Record<string, LoadBalancerAdapter>>,
  env: EnvConfig = parseEnv(),
  probe?: Probe
): Map<string, BackendHealthCheck> {
  const missing = Object.keys(config.backends).filter(
    (name) => !Object.prototype.hasOwnProperty.call(adapters, name)
  );
  if (missing.length) {
    throw new ConfigurationError(
      "No load balancer registered for backend(s)",
      missing
    );
  }

  const backends = new Map<string, BackendHealthCheck>();
  for (const [name, backend] of Object.entries(config.backends)) {
    backends.set(
      name,
      new BackendHealthCheck(
        name,
        {
          path: backend.path,
          interval: backend.interval,
          timeout: backend.timeout ?? env.HEALTH_CHECK_TIMEOUT,
          lb: adapters[name],
        },
        probe
      )
    );
  }
  return backends;
}
