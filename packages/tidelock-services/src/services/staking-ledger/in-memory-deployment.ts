/**
 * In-memory deployment
 *
 * Wires a StakingLedgerService to in-memory claim tokens, a base-asset
 * wrapper, a manual clock and an in-process event publisher. Used by the
 * simulation CLI and by tests.
 */

import { isAddressEqual, type Address } from 'viem';
import { ZERO_ADDRESS } from '@tidelock/shared';
import type { LedgerConfig } from '../../config/index.js';
import { setLogLevel } from '../../logging/index.js';
import { ManualClock } from '../../clock/index.js';
import { InMemoryEventPublisher } from '../../events/index.js';
import {
  InMemoryBaseAssetWrapper,
  InMemoryClaimToken,
  InMemoryPositionShareToken,
} from '../../collaborators/index.js';
import { TransactionManager } from '../../transaction/index.js';
import { createIssuancePolicy } from '../yield-pool/index.js';
import { StakingLedgerService } from './staking-ledger-service.js';

export const DEFAULT_LEDGER_ADDRESS: Address = '0x0000000000000000000000000000000000001000';
export const DEFAULT_BASE_ASSET_ADDRESS: Address = '0x0000000000000000000000000000000000002000';

export interface InMemoryDeploymentOptions {
  /** Initial ledger time in unix seconds (default 0) */
  startTime?: bigint;
  ledgerAddress?: Address;
  baseAssetAddress?: Address;
}

export interface InMemoryDeployment {
  ledger: StakingLedgerService;
  clock: ManualClock;
  publisher: InMemoryEventPublisher;
  baseAsset: InMemoryBaseAssetWrapper;
  principalClaim: InMemoryClaimToken;
  yieldClaim: InMemoryClaimToken;
  /** Present in the fractional model only */
  positionShares?: InMemoryPositionShareToken;
}

/**
 * Build a complete ledger deployment held in memory.
 *
 * A zero yield reporter in the configuration is replaced by the wrapper's
 * address, so `baseAsset.reportYield` reaches the ledger out of the box.
 * The configured log level is applied before any service is built.
 */
export function createInMemoryDeployment(
  config: LedgerConfig,
  options: InMemoryDeploymentOptions = {}
): InMemoryDeployment {
  setLogLevel(config.logLevel);

  const clock = new ManualClock(options.startTime ?? 0n);
  const publisher = new InMemoryEventPublisher();
  const transactions = new TransactionManager({ publisher });

  const ledgerAddress = options.ledgerAddress ?? DEFAULT_LEDGER_ADDRESS;
  const baseAsset = new InMemoryBaseAssetWrapper({
    address: options.baseAssetAddress ?? DEFAULT_BASE_ASSET_ADDRESS,
    symbol: `w${config.asset.symbol}`,
  });
  const principalClaim = new InMemoryClaimToken(`pc${config.asset.symbol}`);
  const yieldClaim = new InMemoryClaimToken(`yc${config.asset.symbol}`);
  const positionShares =
    config.positionModel === 'fractional' ? new InMemoryPositionShareToken() : undefined;

  const yieldReporter = isAddressEqual(config.parameters.yieldReporter, ZERO_ADDRESS)
    ? baseAsset.address
    : config.parameters.yieldReporter;

  const ledger = new StakingLedgerService({
    address: ledgerAddress,
    positionModel: config.positionModel,
    issuancePolicy: createIssuancePolicy(config.issuancePolicy),
    collaborators: { baseAsset, principalClaim, yieldClaim, positionShares },
    transactions,
    clock,
    owner: config.owner,
    parameters: { ...config.parameters, yieldReporter },
    assertInvariants: config.assertInvariants,
  });
  baseAsset.connectYieldSink(ledger, ledger.address);

  return { ledger, clock, publisher, baseAsset, principalClaim, yieldClaim, positionShares };
}
