export { HealthCheck, loadBackends } from "./healthCheck";
export type { HealthCheckOptions, MonitoredBackends } from "./healthCheck";
export {
  BackendHealthCheck,
  DEFAULT_WEIGHT,
  runBackendHealthCheck,
} from "./backendHealthCheck";
export { ServerPool } from "./backendPool";
export type { PoolServer } from "./backendPool";
export { checkHealth, probeServer } from "./probe";
export {
  ConfigurationError,
  DEFAULT_REQUEST_TIMEOUT,
  MAX_TIMER_DELAY,
  parseBackendHealthCheckOptions,
  parseEnv,
  parseHealthCheckConfig,
} from "./config";
export type {
  BackendConfig,
  BackendHealthCheckOptions,
  EnvConfig,
  HealthCheckConfig,
} from "./config";
export { Logger } from "./logger";
export type { LogFormat, LogLevel, LoggerOptions } from "./logger";
export type {
  BackendStatus,
  LoadBalancerAdapter,
  MaybePromise,
  Probe,
  ProbeResult,
} from "./types";
