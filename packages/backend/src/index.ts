/**
 * @fileoverview Command line entry point of the conversion gateway.
 *
 *   load-deposits [--coins A,B]
 *   convert-coins [--coins A,B] [--dry]
 *   map-address <coin> <address> <destCoin> <destAddress> [--memo m] [--dest-memo m]
 *   refund <depositId> [--to address] [--reason text]
 *   stats
 *
 * Exit codes: 0 clean, 2 finished with per-item failures (or a failed refund
 * send), 1 fatal.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load environment variables from the repository root
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
import { ConfigurationError } from '@convgate/core';
import type { CoinSymbol } from '@convgate/core';
import type { HandlerFactory } from '@convgate/handlers';
import { loadGatewayConfig, pairsFrom } from './config/gateway-config';
import { createGateway } from './gateway';
import type { Gateway } from './gateway';
import { RefundRefusedError } from './services/RefundService';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

/**
 * Bad command line. Reported with the usage text; exit code 1.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  command?: string;
  positionals: string[];
  coins?: CoinSymbol[];
  dryRun: boolean;
  memo?: string;
  destMemo?: string;
  returnTo?: string;
  reason?: string;
  help: boolean;
}

function flagValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} needs a value`);
  }
  return value;
}

// Parse command line arguments
export function parseArgs(args: string[]): CliArgs {
  const options: CliArgs = { positionals: [], dryRun: false, help: false };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--coins':
        options.coins = flagValue(args, ++i, '--coins')
          .split(',')
          .map(s => s.trim().toUpperCase())
          .filter(s => s.length > 0);
        break;
      case '--dry':
        options.dryRun = true;
        break;
      case '--memo':
        options.memo = flagValue(args, ++i, '--memo');
        break;
      case '--dest-memo':
        options.destMemo = flagValue(args, ++i, '--dest-memo');
        break;
      case '--to':
        options.returnTo = flagValue(args, ++i, '--to');
        break;
      case '--reason':
        options.reason = flagValue(args, ++i, '--reason');
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        if (args[i].startsWith('-')) {
          throw new UsageError(`Unknown option ${args[i]}`);
        }
        if (options.command === undefined) {
          options.command = args[i];
        } else {
          options.positionals.push(args[i]);
        }
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Coin conversion gateway

Usage: convgate <command> [options]

Commands:
  load-deposits                 Record new incoming transactions of every enabled coin
  convert-coins                 Convert and send every convertible deposit
  map-address <coin> <address> <destCoin> <destAddress>
                                Route deposits to <address> to <destAddress> in <destCoin>
  refund <depositId>            Return an invalid or error deposit to its sender
  stats                         Deposit counts per status and conversion totals per pair

Options:
  --coins <A,B>       Only these coins (load-deposits, convert-coins)
  --dry               Log what would be sent without claiming or sending (convert-coins)
  --memo <memo>       Only route deposits carrying this memo (map-address)
  --dest-memo <memo>  Memo to send with the converted funds (map-address)
  --to <address>      Return to this address instead of the sender (refund)
  --reason <text>     Refund memo instead of the deposit's error reason (refund)
  -h, --help          Show this help message

Environment:
  CONVGATE_CONFIG (default ./config/convgate.json), DB_PATH, EX_FEE, HANDLER_TIMEOUT_MS,
  HANDLER_CONCURRENCY, STALE_CLAIM_MS, MAX_CONVERT_ATTEMPTS, CONVERT_BATCH_SIZE
  `);
}

function mapAddress(gateway: Gateway, args: CliArgs): number {
  if (args.positionals.length !== 4) {
    throw new UsageError('map-address needs <coin> <address> <destCoin> <destAddress>');
  }
  const [coin, address, destCoin, destAddress] = args.positionals;
  const depositCoin = coin.toUpperCase();
  const destinationCoin = destCoin.toUpperCase();

  if (!gateway.config.coins.some(c => c.symbol === depositCoin)) {
    throw new UsageError(`Unknown coin ${depositCoin}`);
  }
  if (!pairsFrom(gateway.config, depositCoin).some(p => p.to === destinationCoin)) {
    throw new UsageError(`No coin pair ${depositCoin} -> ${destinationCoin} is configured`);
  }

  gateway.routes.upsert({
    depositCoin,
    depositAddress: address,
    depositMemo: args.memo ?? null,
    destinationCoin,
    destinationAddress: destAddress,
    destinationMemo: args.destMemo ?? null,
  });
  console.log(
    `[CLI] Deposits of ${depositCoin} to ${address}${args.memo ? ` (memo "${args.memo}")` : ''} ` +
    `now convert to ${destinationCoin} at ${destAddress}`,
  );
  return EXIT_OK;
}

async function refund(gateway: Gateway, args: CliArgs): Promise<number> {
  if (args.positionals.length !== 1) {
    throw new UsageError('refund needs <depositId>');
  }
  const outcome = await gateway.refunder.refund(args.positionals[0], { returnTo: args.returnTo, reason: args.reason });
  if (!outcome.ok) {
    console.error(`[CLI] Refund failed: ${outcome.reason}`);
    return EXIT_PARTIAL;
  }
  const { refund: made } = outcome;
  console.log(`[CLI] Returned ${made.amount} ${made.coin} to ${made.destination} (tx ${made.txid ?? 'pending'})`);
  return EXIT_OK;
}

function stats(gateway: Gateway): number {
  const counts = gateway.deposits.countByStatus();
  console.log('Deposits:');
  if (counts.length === 0) {
    console.log('  (none)');
  }
  for (const row of counts) {
    console.log(`  ${row.coin.padEnd(8)} ${row.status.padEnd(10)} ${row.count}`);
  }

  const totals = gateway.conversions.totalsByPair();
  console.log('Conversions:');
  if (totals.length === 0) {
    console.log('  (none)');
  }
  for (const t of totals) {
    console.log(`  ${t.fromCoin} -> ${t.toCoin}: ${t.count} conversions, received ${t.received} ${t.fromCoin}, sent ${t.sent} ${t.toCoin}`);
  }
  return EXIT_OK;
}

async function dispatch(gateway: Gateway, args: CliArgs): Promise<number> {
  switch (args.command) {
    case 'load-deposits': {
      const summary = await gateway.ingestion.run({ coins: args.coins });
      return summary.hasFailures ? EXIT_PARTIAL : EXIT_OK;
    }
    case 'convert-coins': {
      const summary = await gateway.conversion.run({ coins: args.coins, dryRun: args.dryRun });
      return summary.hasFailures ? EXIT_PARTIAL : EXIT_OK;
    }
    case 'map-address':
      return mapAddress(gateway, args);
    case 'refund':
      return refund(gateway, args);
    case 'stats':
      return stats(gateway);
    default:
      throw new UsageError(`Unknown command ${String(args.command)}`);
  }
}

const COMMANDS = ['load-deposits', 'convert-coins', 'map-address', 'refund', 'stats'];

/**
 * Runs one command and returns the process exit code. Never throws.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  factories?: Record<string, HandlerFactory>,
): Promise<number> {
  let gateway: Gateway | undefined;
  try {
    const args = parseArgs(argv);
    if (args.help || args.command === undefined) {
      showHelp();
      return args.help ? EXIT_OK : EXIT_FATAL;
    }
    if (!COMMANDS.includes(args.command)) {
      throw new UsageError(`Unknown command ${args.command}`);
    }

    gateway = await createGateway(loadGatewayConfig(env), { factories });
    return await dispatch(gateway, args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`[CLI] ${error.message}`);
      showHelp();
    } else if (error instanceof ConfigurationError || error instanceof RefundRefusedError) {
      console.error(`[CLI] ${error.message}`);
    } else {
      console.error('[CLI] Fatal error:', error);
    }
    return EXIT_FATAL;
  } finally {
    gateway?.close();
  }
}

// Run if called directly
if (require.main === module) {
  runCli(process.argv.slice(2)).then(code => {
    process.exit(code);
  }).catch(error => {
    console.error('[CLI] Fatal error:', error);
    process.exit(EXIT_FATAL);
  });
}

export { createGateway } from './gateway';
export type { Gateway, GatewayOptions } from './gateway';
export * from './config/gateway-config';
export * from './pipelines/DepositIngestion';
export * from './pipelines/ConversionPipeline';
export * from './services/RefundService';
