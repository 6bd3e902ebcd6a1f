import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvInteger(key: string, defaultValue: number): number {
  const parsed = getEnvNumber(key, defaultValue);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvMarginMode(key: string, defaultValue: 'cross' | 'isolated'): 'cross' | 'isolated' {
  const value = getEnvVar(key, defaultValue).toLowerCase();
  if (value !== 'cross' && value !== 'isolated') {
    throw new Error(`Environment variable ${key} must be "cross" or "isolated"`);
  }
  return value;
}

export const config = {
  // Lighter API Configuration
  lighter: {
    endpoint: getEnvVar('LIGHTER_ENDPOINT', 'https://mainnet.zklighter.elliot.ai'),

    /** Account index the engine trades and reads balances for */
    accountIndex: getEnvInteger('LIGHTER_ACCOUNT_INDEX', 0),

    requestTimeoutMs: getEnvNumber('LIGHTER_REQUEST_TIMEOUT_MS', 10000),
  },

  // Execution Engine Configuration
  execution: {
    /** Kill switch. When false, orders go to the dry-run signer. */
    enabled: getEnvBoolean('EXECUTION_ENABLED', false),

    /** Adverse price offset for marketable IOC orders (0.01 = 1%) */
    slippage: getEnvNumber('EXECUTION_SLIPPAGE', 0.01),

    /** Lifetime of stop-loss / take-profit orders */
    protectiveOrderExpiryDays: getEnvNumber('EXECUTION_PROTECTIVE_EXPIRY_DAYS', 30),

    /** Quote suffix stripped from symbols to get the exchange coin */
    quoteSuffix: getEnvVar('EXECUTION_QUOTE_SUFFIX', 'USDT'),

    /** Decimals used when a market has no cached metadata */
    fallbackDecimals: getEnvInteger('EXECUTION_FALLBACK_DECIMALS', 4),

    /** Refuse to encode symbols without metadata instead of falling back */
    strictPrecision: getEnvBoolean('EXECUTION_STRICT_PRECISION', false),

    defaultMarginMode: getEnvMarginMode('EXECUTION_MARGIN_MODE', 'cross'),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    fileEnabled: getEnvBoolean('LOG_FILE_ENABLED', true),
    silent: getEnvBoolean('LOG_SILENT', false),
  },
} as const;

export type Config = typeof config;
