#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { simulateCommand } from './commands/simulate.js';
import { quoteExitCommand } from './commands/quote-exit.js';

const program = new Command();

program
  .name('tidelock')
  .description('Tidelock staking ledger CLI')
  .version('0.1.0');

program.addCommand(simulateCommand);
program.addCommand(quoteExitCommand);

program.addHelpText('after', `

Examples:
  $ tidelock simulate scenarios/basic.json          Replay a scenario and print the final state
  $ tidelock simulate scenarios/basic.json --json   Full report with every event
  $ tidelock quote-exit -a 1 -l 30 -e 10            Price an exit 10 days into a 30-day lock
  $ tidelock quote-exit -a 1 -l 30 -m fractional -s 250000000000000000 --burn-fee-rate 2000

Configuration is read from the environment (or a .env file):
  TIDELOCK_ASSET_PROFILE, TIDELOCK_POSITION_MODEL, TIDELOCK_ISSUANCE_POLICY,
  TIDELOCK_MIN_LOCKUP_DAYS, TIDELOCK_MAX_LOCKUP_DAYS, TIDELOCK_MIN_STAKE,
  TIDELOCK_FORCE_UNSTAKE_FEE_RATE, TIDELOCK_BURNED_YIELD_CLAIM_FEE_RATE, LOG_LEVEL
`);

program.parse();
