export const config = {
  wikiApiUrl: process.env.WIKI_API_URL || "https://theapplewiki.com/api.php",
  ipswApiUrl: process.env.IPSW_API_URL || "https://api.ipsw.me/v4",
  dbPath: process.env.DB_PATH || "data/betas.db",
  // Empty string disables the JSON file output
  catalogPath: process.env.CATALOG_PATH ?? "data/betas.json",
  port: parseInt(process.env.PORT || "5000", 10),
  host: process.env.HOST || "0.0.0.0",
  tsscheckerPath: process.env.TSSCHECKER_PATH || "tsschecker",
  checkerTimeoutMs: parseInt(process.env.CHECKER_TIMEOUT_MS || "60000", 10),
  maxConcurrentChecks: parseInt(process.env.MAX_CONCURRENT_CHECKS || "4", 10),
  scrapeIntervalMs: parseInt(process.env.SCRAPE_INTERVAL_MS || String(3 * 60 * 60 * 1000), 10),
  wikiCacheTtlMs: parseInt(process.env.WIKI_CACHE_TTL_MS || String(15 * 60 * 1000), 10),
  enableSigningCheck: process.env.ENABLE_SIGNING_CHECK !== "false",
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
