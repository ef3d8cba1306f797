function parseEncoding(raw: string | undefined): BufferEncoding {
  return raw && Buffer.isEncoding(raw) ? raw : "utf16le";
}

export const config = {
  inputPath: process.env.INPUT_PATH || "data/urls.csv",
  inputEncoding: parseEncoding(process.env.INPUT_ENCODING),
  urlDelimiter: process.env.URL_DELIMITER || "    ",
  outputPath: process.env.OUTPUT_PATH || "data/prices.csv",
  diagnosticLogPath: process.env.DIAGNOSTIC_LOG_PATH || "data/return.txt",
  dbPath: process.env.DB_PATH ?? "data/price-reconciler.db",
  aggregatorEndpoint: process.env.AGGREGATOR_ENDPOINT || "https://www.skroutz.gr/s",
  ownShopId: process.env.OWN_SHOP_ID || "12345",
  aggregatorMaxAttempts: parseInt(process.env.AGGREGATOR_MAX_ATTEMPTS || "3", 10),
  aggregatorBackoffSeconds: parseInt(process.env.AGGREGATOR_BACKOFF_SECONDS || "5", 10),
  sessionRotateEvery: parseInt(process.env.SESSION_ROTATE_EVERY || "10", 10),
  headless: process.env.HEADLESS !== "false",
  navigationTimeoutMs: parseInt(process.env.NAVIGATION_TIMEOUT_MS || "45000", 10),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "15000", 10),
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
