/**
 * @fileoverview Gateway configuration.
 * Runtime knobs come from environment variables (loaded from .env by dotenv);
 * coins, pairs, rate sources and handlers come from a JSON file named by
 * CONVGATE_CONFIG. Everything is validated up front and every problem is
 * reported at once in a single ConfigurationError.
 */

import fs from 'fs';
import path from 'path';
import { ConfigurationError, isDecimalString, isPositiveAmount, parseAmount } from '@convgate/core';
import type { Coin, CoinPair, CoinSymbol, RateSpec } from '@convgate/core';

export const DEFAULT_CONFIG_PATH = './config/convgate.json';

/**
 * A dynamic rate read from a JSON HTTP endpoint.
 */
export interface HttpJsonRateSource {
  type: 'http-json';
  url: string;
  /** Dot-separated path to the numeric rate in the response, e.g. "data.price" */
  path: string;
  /** How long a fetched rate is reused */
  cacheTtlMs: number;
  /** Use 1/value, for endpoints that quote the pair the other way round */
  invert: boolean;
}

export type RateSourceConfig = HttpJsonRateSource;

export interface HandlersConfig {
  enabled: string[];
  options: Record<string, Record<string, unknown>>;
}

export interface GatewayConfig {
  dbPath: string;
  /** Exchange fee percentage for pairs that do not set their own */
  defaultFeePercent: string;
  handlerTimeoutMs: number;
  /** Calls in flight into one handler, for loads, validations and sends alike */
  handlerConcurrency: number;
  /** A processing claim older than this is considered abandoned; must exceed handlerTimeoutMs */
  staleClaimMs: number;
  maxConvertAttempts: number;
  convertBatchSize: number;
  coins: Coin[];
  pairs: CoinPair[];
  rateSources: Record<string, RateSourceConfig>;
  handlers: HandlersConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIntEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, problems: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min}, got "${raw}"`);
    return fallback;
  }
  return value;
}

function isFeePercent(value: string): boolean {
  return isDecimalString(value) && parseAmount(value).lt(100);
}

function parseCoin(raw: unknown, index: number, problems: string[]): Coin | null {
  const where = `coins[${index}]`;
  if (!isRecord(raw)) {
    problems.push(`${where} must be an object`);
    return null;
  }
  const before = problems.length;

  const symbol = raw.symbol;
  if (typeof symbol !== 'string' || symbol.length === 0 || symbol !== symbol.toUpperCase()) {
    problems.push(`${where}.symbol must be a non-empty upper-case string`);
  }
  if (typeof raw.handler !== 'string' || raw.handler.length === 0) {
    problems.push(`${where}.handler must name a handler`);
  }
  const mode = raw.mode;
  if (mode !== 'address' && mode !== 'account') {
    problems.push(`${where}.mode must be "address" or "account"`);
  }
  const decimals = raw.decimals ?? 8;
  if (typeof decimals !== 'number' || !Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
    problems.push(`${where}.decimals must be an integer between 0 and 18`);
  }
  const networkFee = raw.networkFee ?? '0';
  if (typeof networkFee !== 'string' || !isDecimalString(networkFee)) {
    problems.push(`${where}.networkFee must be a decimal string`);
  }
  const enabled = raw.enabled ?? true;
  if (typeof enabled !== 'boolean') {
    problems.push(`${where}.enabled must be a boolean`);
  }
  const displayName = raw.displayName ?? symbol;

  if (
    problems.length > before
    || typeof symbol !== 'string'
    || typeof raw.handler !== 'string'
    || (mode !== 'address' && mode !== 'account')
    || typeof decimals !== 'number'
    || typeof networkFee !== 'string'
    || typeof enabled !== 'boolean'
  ) {
    return null;
  }
  return {
    symbol,
    displayName: typeof displayName === 'string' ? displayName : symbol,
    handler: raw.handler,
    mode,
    decimals,
    networkFee,
    enabled,
  };
}

function parseRateSpec(raw: unknown, where: string, sources: Record<string, RateSourceConfig>, problems: string[]): RateSpec | null {
  if (!isRecord(raw)) {
    problems.push(`${where}.rate must be { type: "fixed", value } or { type: "dynamic", source }`);
    return null;
  }
  if (raw.type === 'fixed') {
    if (typeof raw.value !== 'string' || !isPositiveAmount(raw.value)) {
      problems.push(`${where}.rate.value must be a positive decimal string`);
      return null;
    }
    return { type: 'fixed', value: raw.value };
  }
  if (raw.type === 'dynamic') {
    if (typeof raw.source !== 'string' || !(raw.source in sources)) {
      problems.push(`${where}.rate.source must name one of rateSources (${Object.keys(sources).join(', ') || 'none defined'})`);
      return null;
    }
    return { type: 'dynamic', source: raw.source };
  }
  problems.push(`${where}.rate.type must be "fixed" or "dynamic"`);
  return null;
}

function parsePair(
  raw: unknown,
  index: number,
  coins: Set<CoinSymbol>,
  sources: Record<string, RateSourceConfig>,
  defaultFeePercent: string,
  problems: string[],
): CoinPair | null {
  const where = `pairs[${index}]`;
  if (!isRecord(raw)) {
    problems.push(`${where} must be an object`);
    return null;
  }
  const before = problems.length;
  const { from, to } = raw;
  if (typeof from !== 'string' || !coins.has(from)) {
    problems.push(`${where}.from must be a configured coin, got ${JSON.stringify(from)}`);
  }
  if (typeof to !== 'string' || !coins.has(to)) {
    problems.push(`${where}.to must be a configured coin, got ${JSON.stringify(to)}`);
  }
  if (from === to) {
    problems.push(`${where} converts ${String(from)} into itself`);
  }
  const rate = parseRateSpec(raw.rate, where, sources, problems);
  const feePercent = raw.feePercent ?? defaultFeePercent;
  if (typeof feePercent !== 'string' || !isFeePercent(feePercent)) {
    problems.push(`${where}.feePercent must be a decimal string in [0, 100)`);
  }
  const minAmount = raw.minAmount;
  if (minAmount !== undefined && (typeof minAmount !== 'string' || !isDecimalString(minAmount))) {
    problems.push(`${where}.minAmount must be a decimal string`);
  }

  if (problems.length > before || typeof from !== 'string' || typeof to !== 'string' || !rate || typeof feePercent !== 'string') {
    return null;
  }
  const pair: CoinPair = { from, to, rate, feePercent };
  if (typeof minAmount === 'string') {
    pair.minAmount = minAmount;
  }
  return pair;
}

function parseRateSources(raw: unknown, problems: string[]): Record<string, RateSourceConfig> {
  const sources: Record<string, RateSourceConfig> = {};
  if (raw === undefined) {
    return sources;
  }
  if (!isRecord(raw)) {
    problems.push('rateSources must be an object keyed by source name');
    return sources;
  }
  for (const [name, source] of Object.entries(raw)) {
    if (!isRecord(source) || source.type !== 'http-json') {
      problems.push(`rateSources.${name}.type must be "http-json"`);
      continue;
    }
    const cacheTtlMs = source.cacheTtlMs ?? 60000;
    const invert = source.invert ?? false;
    if (typeof source.url !== 'string' || !/^https?:\/\//.test(source.url)) {
      problems.push(`rateSources.${name}.url must be an http(s) URL`);
    }
    if (typeof source.path !== 'string' || source.path.length === 0) {
      problems.push(`rateSources.${name}.path must be a dot-separated path`);
    }
    if (typeof cacheTtlMs !== 'number' || !Number.isInteger(cacheTtlMs) || cacheTtlMs < 0) {
      problems.push(`rateSources.${name}.cacheTtlMs must be a non-negative integer`);
    }
    if (typeof invert !== 'boolean') {
      problems.push(`rateSources.${name}.invert must be a boolean`);
    }
    if (typeof source.url === 'string' && typeof source.path === 'string' && typeof cacheTtlMs === 'number' && typeof invert === 'boolean') {
      sources[name] = { type: 'http-json', url: source.url, path: source.path, cacheTtlMs, invert };
    }
  }
  return sources;
}

function parseHandlers(raw: unknown, problems: string[]): HandlersConfig {
  const handlers: HandlersConfig = { enabled: [], options: {} };
  if (!isRecord(raw)) {
    problems.push('handlers must be { enabled: string[], options?: { [name]: object } }');
    return handlers;
  }
  if (!Array.isArray(raw.enabled) || raw.enabled.length === 0) {
    problems.push('handlers.enabled must list at least one handler');
  } else {
    for (const name of raw.enabled) {
      if (typeof name === 'string') {
        handlers.enabled.push(name);
      } else {
        problems.push(`handlers.enabled contains a non-string entry ${JSON.stringify(name)}`);
      }
    }
  }
  if (raw.options !== undefined) {
    if (!isRecord(raw.options)) {
      problems.push('handlers.options must be an object keyed by handler name');
    } else {
      for (const [name, options] of Object.entries(raw.options)) {
        if (isRecord(options)) {
          handlers.options[name] = options;
        } else {
          problems.push(`handlers.options.${name} must be an object`);
        }
      }
    }
  }
  return handlers;
}

/**
 * Validates a parsed configuration file together with the environment.
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseGatewayConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const problems: string[] = [];
  const file: Record<string, unknown> = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) {
    problems.push('configuration file must contain a JSON object');
  }

  const defaultFeePercent = env.EX_FEE?.trim() || '0';
  if (!isFeePercent(defaultFeePercent)) {
    problems.push(`EX_FEE must be a decimal percentage in [0, 100), got "${defaultFeePercent}"`);
  }

  const coins: Coin[] = [];
  if (!Array.isArray(file.coins) || file.coins.length === 0) {
    problems.push('coins must be a non-empty array');
  } else {
    file.coins.forEach((entry: unknown, i: number) => {
      const coin = parseCoin(entry, i, problems);
      if (!coin) {
        return;
      }
      if (coins.some(c => c.symbol === coin.symbol)) {
        problems.push(`coin ${coin.symbol} is defined twice`);
        return;
      }
      coins.push(coin);
    });
  }

  const rateSources = parseRateSources(file.rateSources, problems);
  const symbols = new Set(coins.map(c => c.symbol));

  const pairs: CoinPair[] = [];
  if (!Array.isArray(file.pairs)) {
    problems.push('pairs must be an array');
  } else {
    file.pairs.forEach((entry: unknown, i: number) => {
      const pair = parsePair(entry, i, symbols, rateSources, defaultFeePercent, problems);
      if (!pair) {
        return;
      }
      if (pairs.some(p => p.from === pair.from && p.to === pair.to)) {
        problems.push(`pair ${pair.from} -> ${pair.to} is defined twice`);
        return;
      }
      pairs.push(pair);
    });
  }

  const config: GatewayConfig = {
    dbPath: env.DB_PATH?.trim() || './data/convgate.db',
    defaultFeePercent,
    handlerTimeoutMs: readIntEnv(env, 'HANDLER_TIMEOUT_MS', 30000, 1, problems),
    handlerConcurrency: readIntEnv(env, 'HANDLER_CONCURRENCY', 4, 1, problems),
    staleClaimMs: readIntEnv(env, 'STALE_CLAIM_MS', 600000, 1, problems),
    maxConvertAttempts: readIntEnv(env, 'MAX_CONVERT_ATTEMPTS', 5, 1, problems),
    convertBatchSize: readIntEnv(env, 'CONVERT_BATCH_SIZE', 100, 1, problems),
    coins,
    pairs,
    rateSources,
    handlers: parseHandlers(file.handlers, problems),
  };

  // A claim renewed right before a send must outlive that send
  if (config.staleClaimMs <= config.handlerTimeoutMs) {
    problems.push(`STALE_CLAIM_MS (${config.staleClaimMs}) must be greater than HANDLER_TIMEOUT_MS (${config.handlerTimeoutMs})`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Reads the configuration file named by CONVGATE_CONFIG and validates it.
 *
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const configPath = path.resolve(env.CONVGATE_CONFIG || DEFAULT_CONFIG_PATH);
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError([`configuration file not found: ${configPath}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`${configPath} is not valid JSON: ${message}`]);
  }

  const config = parseGatewayConfig(raw, env);
  console.log(`[Config] Loaded ${config.coins.length} coins and ${config.pairs.length} pairs from ${configPath}`);
  return config;
}

/**
 * Outgoing pairs of `coin`.
 */
export function pairsFrom(config: Pick<GatewayConfig, 'pairs'>, coin: CoinSymbol): CoinPair[] {
  return config.pairs.filter(p => p.from === coin);
}
