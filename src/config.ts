import { z } from "zod";
import { LOG_FORMATS, LOG_LEVELS } from "./logger";
import { LoadBalancerAdapter } from "./types";

export const DEFAULT_REQUEST_TIMEOUT = 5000;

// Longest delay a Node.js timer honors; larger values fire after 1ms
export const MAX_TIMER_DELAY = 2_147_483_647;

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

function isLoadBalancerAdapter(value: unknown): value is LoadBalancerAdapter {
  return (
    typeof value === "object" &&
    value !== null &&
    "servers" in value &&
    typeof value.servers === "function" &&
    "upsertServer" in value &&
    typeof value.upsertServer === "function" &&
    "removeServer" in value &&
    typeof value.removeServer === "function"
  );
}

const LoadBalancerAdapterSchema = z.custom<LoadBalancerAdapter>(
  isLoadBalancerAdapter,
  {
    message:
      "Load balancer must implement servers(), upsertServer() and removeServer()",
  }
);

const IntervalSchema = z
  .number()
  .int()
  .positive("Health check interval must be greater than 0ms")
  .max(MAX_TIMER_DELAY, `Health check interval must be at most ${MAX_TIMER_DELAY}ms`);

const TimeoutSchema = z
  .number()
  .int()
  .positive("Health check timeout must be greater than 0ms")
  .max(MAX_TIMER_DELAY, `Health check timeout must be at most ${MAX_TIMER_DELAY}ms`);

const BackendHealthCheckOptionsSchema = z.object({
  path: z.string(),
  interval: IntervalSchema,
  timeout: TimeoutSchema.default(DEFAULT_REQUEST_TIMEOUT),
  lb: LoadBalancerAdapterSchema,
});

// Declarative form of a backend, before it is paired with its load balancer
const BackendConfigSchema = z.object({
  path: z.string().default(""),
  interval: IntervalSchema,
  timeout: TimeoutSchema.optional(),
});

const HealthCheckConfigSchema = z.object({
  backends: z.record(
    z.string().min(1, "Backend name cannot be empty"),
    BackendConfigSchema
  ),
});

const EnvSchema = z.object({
  HEALTH_CHECK_TIMEOUT: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : DEFAULT_REQUEST_TIMEOUT))
    .pipe(TimeoutSchema),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_FORMAT: z.enum(LOG_FORMATS).default("text"),
});

export type BackendHealthCheckOptions = z.input<
  typeof BackendHealthCheckOptionsSchema
>;
export type ResolvedBackendHealthCheckOptions = z.infer<
  typeof BackendHealthCheckOptionsSchema
>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type HealthCheckConfig = z.infer<typeof HealthCheckConfigSchema>;
export type EnvConfig = z.infer<typeof EnvSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message: string
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(message, formatIssues(result.error));
  }
  return result.data;
}

export function parseBackendHealthCheckOptions(
  options: unknown,
  backend: string
): ResolvedBackendHealthCheckOptions {
  return parseWith(
    BackendHealthCheckOptionsSchema,
    options,
    `Invalid health check configuration for backend "${backend}"`
  );
}

export function parseHealthCheckConfig(input: unknown): HealthCheckConfig {
  return parseWith(
    HealthCheckConfigSchema,
    input,
    "Health check configuration validation failed"
  );
}

export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvConfig {
  return parseWith(EnvSchema, env, "Environment validation failed");
}

export {
  BackendHealthCheckOptionsSchema,
  BackendConfigSchema,
  HealthCheckConfigSchema,
  EnvSchema,
};
