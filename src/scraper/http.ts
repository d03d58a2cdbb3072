import { apiLogger } from "../logger.js";

let lastRequestTime = 0;

/**
 * fetch() spaced at least `minIntervalMs` after the previous request made
 * through this helper, process-wide.
 */
export async function rateLimitedFetch(
  url: string,
  minIntervalMs: number,
  options?: RequestInit
): Promise<Response> {
  const now = Date.now();
  const elapsed = now - lastRequestTime;

  if (elapsed < minIntervalMs) {
    const waitTime = minIntervalMs - elapsed;
    apiLogger.debug({ waitTime }, "Rate limiting: waiting before request");
    await sleep(waitTime);
  }

  lastRequestTime = Date.now();

  const method = options?.method ?? "GET";
  apiLogger.debug({ method, url: redact(url) }, "Sending request");

  const startTime = performance.now();
  const response = await fetch(url, options);
  const duration = Math.round(performance.now() - startTime);

  apiLogger.debug(
    {
      method,
      url: redact(url),
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response"
  );

  return response;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Hide the account name passed as a query parameter */
function redact(url: string): string {
  return url.replace(/([?&]username=)[^&]*/, "$1***");
}
