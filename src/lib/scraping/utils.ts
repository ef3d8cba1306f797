import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

let proxy: { url: string; agent: ProxyAgent } | null = null;

/** One shared agent per proxy URL, reused by every request in the process */
export function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  if (!proxy || proxy.url !== proxyUrl) {
    proxy = { url: proxyUrl, agent: new ProxyAgent(proxyUrl) };
  }
  return proxy.agent;
}

export async function closeProxyDispatcher(): Promise<void> {
  const current = proxy;
  proxy = null;
  if (current) await current.agent.close();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Fetch a product page as HTML. Throws on network failure, timeout or non-2xx. */
export async function fetchPage(
  url: string,
  options: {
    retries?: number;
    retryDelayMs?: number;
    timeoutMs?: number;
  } = {}
): Promise<string> {
  const { retries = 0, retryDelayMs = 2000, timeoutMs = config.fetchTimeoutMs } = options;

  const dispatcher = getProxyDispatcher();
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const fetchOptions: Parameters<typeof undiciFetch>[1] = {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept:
            "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "el-GR,el;q=0.9,en;q=0.8",
        },
        signal: controller.signal,
        dispatcher,
      };

      const response = await undiciFetch(url, fetchOptions);

      if (!response.ok) {
        await response.body?.cancel();
        throw new Error(`HTTP ${response.status} for ${url}`);
      }

      return await response.text();
    } catch (error: unknown) {
      lastError = error;
      if (attempt < retries) {
        await delay(retryDelayMs * Math.pow(2, attempt));
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`Failed to fetch ${url} after ${retries} retries`);
}
