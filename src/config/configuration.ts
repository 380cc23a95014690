function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export default () => ({
  port: intFromEnv('PORT', 8741),

  // Empty disables the bearer gate
  proxyApiKey: process.env.PROXY_API_KEY ?? '',

  defaultModel: process.env.DEFAULT_MODEL ?? 'anthropic/claude-opus-4-6',

  accounts: {
    file: process.env.ACCOUNTS_FILE ?? 'data/accounts.json',
  },

  upstream: {
    baseUrl: process.env.UPSTREAM_BASE_URL ?? 'https://chat.atxp.ai',
    endpoint: process.env.UPSTREAM_ENDPOINT ?? 'ATXP',
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
    servedNamespace: 'anthropic',
    refreshTimeoutMs: 15000,
    initiateTimeoutMs: 30000,
    streamTimeoutMs: 300000,
  },

  retry: {
    maxAttempts: intFromEnv('INITIATE_MAX_ATTEMPTS', 3),
    baseDelayMs: intFromEnv('INITIATE_BASE_DELAY_MS', 1000),
  },
});
