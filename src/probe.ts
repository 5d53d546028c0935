import { errorMessage } from "./logger";
import { ProbeResult } from "./types";

/**
 * Issues a single GET against `serverUrl + path`. Only a 200 counts as
 * healthy; transport errors and timeouts resolve to an unhealthy result.
 */
export async function probeServer(
  serverUrl: string,
  path: string,
  timeout: number
): Promise<ProbeResult> {
  let response: Response;
  try {
    response = await fetch(`${serverUrl}${path}`, {
      method: "GET",
      signal: AbortSignal.timeout(timeout),
    });
  } catch (error) {
    return { healthy: false, error: describeFailure(error) };
  }

  const result = { healthy: response.status === 200, status: response.status };
  try {
    // Release the connection without waiting for the rest of the body
    await response.body?.cancel();
  } catch (error) {
    return { ...result, error: describeFailure(error) };
  }
  return result;
}

export async function checkHealth(
  serverUrl: string,
  path: string,
  timeout: number
): Promise<boolean> {
  const result = await probeServer(serverUrl, path, timeout);
  return result.healthy;
}

function describeFailure(error: unknown): string {
  if (error instanceof Error && error.name === "TimeoutError") {
    return "request timed out";
  }
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}
