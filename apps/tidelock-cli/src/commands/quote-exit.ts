import { Command, InvalidArgumentError } from 'commander';
import {
  SECONDS_PER_DAY,
  createInMemoryDeployment,
  loadLedgerConfig,
  parseAssetAmount,
  type ExitPlan,
} from '@tidelock/services';
import { formatExitPlan, toJson } from '../output.js';

const QUOTE_ACCOUNT = '0x000000000000000000000000000000000000dead';

export interface QuoteExitOptions {
  /** Principal staked, in asset units (decimal string) */
  amount: string;
  lockupDays: bigint;
  elapsedSeconds: bigint;
  /** Principal Claim units to redeem; the whole position when omitted */
  share?: bigint;
  /** Environment overrides (TIDELOCK_* variables) */
  env?: Record<string, string>;
}

/**
 * Stake into a throwaway in-memory ledger, move its clock and price the exit
 */
export function quoteExit(
  options: QuoteExitOptions,
  baseEnv: NodeJS.ProcessEnv = process.env
): ExitPlan {
  const config = loadLedgerConfig({ ...baseEnv, ...options.env });
  const { ledger, clock, baseAsset } = createInMemoryDeployment(config);

  const principal = parseAssetAmount(options.amount, config.asset);
  baseAsset.deposit(QUOTE_ACCOUNT, principal);
  const { positionId } = ledger.stake(QUOTE_ACCOUNT, { amount: principal, lockupDays: options.lockupDays });
  clock.advance(options.elapsedSeconds);

  return ledger.quoteExit(positionId, options.share);
}

function parseUint(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return BigInt(value);
}

export const quoteExitCommand = new Command('quote-exit')
  .description('Price an exit of a hypothetical position without touching any ledger')
  .requiredOption('-a, --amount <amount>', 'Principal staked, in asset units (e.g. 1.5)')
  .requiredOption('-l, --lockup-days <days>', 'Lockup of the position in days', parseUint)
  .option('-e, --elapsed-days <days>', 'Days since the stake', parseUint, 0n)
  .option('--elapsed-seconds <seconds>', 'Extra seconds since the stake', parseUint, 0n)
  .option('-s, --share <units>', 'Principal Claim units to redeem (fractional model)', parseUint)
  .option('-m, --model <model>', 'Position model: atomic or fractional')
  .option('--fee-rate <bps>', 'Force-unstake fee rate in basis points')
  .option('--burn-fee-rate <bps>', 'Extra yield-claim burn rate in basis points')
  .option('--json', 'Print the plan as JSON')
  .action(
    (options: {
      amount: string;
      lockupDays: bigint;
      elapsedDays: bigint;
      elapsedSeconds: bigint;
      share?: bigint;
      model?: string;
      feeRate?: string;
      burnFeeRate?: string;
      json?: boolean;
    }) => {
      try {
        const env: Record<string, string> = {};
        if (options.model !== undefined) env.TIDELOCK_POSITION_MODEL = options.model;
        if (options.feeRate !== undefined) env.TIDELOCK_FORCE_UNSTAKE_FEE_RATE = options.feeRate;
        if (options.burnFeeRate !== undefined) env.TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE = options.burnFeeRate;

        const plan = quoteExit(
          {
            amount: options.amount,
            lockupDays: options.lockupDays,
            elapsedSeconds: options.elapsedDays * SECONDS_PER_DAY + options.elapsedSeconds,
            share: options.share,
            env,
          },
          process.env
        );

        if (options.json) {
          console.log(toJson(plan));
          return;
        }

        const { asset } = loadLedgerConfig({ ...process.env, ...env });
        console.log('\n🧾 Exit quote\n');
        for (const line of formatExitPlan(plan, asset)) {
          console.log(line);
        }
        console.log('');
      } catch (error) {
        if (error instanceof Error) {
          console.error(`\n❌ Error: ${error.message}`);
        } else {
          console.error('\n❌ Unknown error occurred');
        }
        process.exit(1);
      }
    }
  );
