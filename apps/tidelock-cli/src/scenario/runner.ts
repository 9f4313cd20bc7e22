/**
 * Scenario Runner
 *
 * Replays a scenario against a fresh in-memory deployment and reports the
 * outcome of every step, the final ledger state and the published events.
 */

import {
  SECONDS_PER_DAY,
  createInMemoryDeployment,
  isLedgerError,
  loadLedgerConfig,
  positionToJSON,
  type InMemoryDeployment,
  type LedgerErrorCode,
  type LedgerEvent,
  type LedgerState,
  type PositionJSON,
} from '@tidelock/services';
import type { Scenario, ScenarioStep } from './schema.js';

export interface StepOutcome {
  index: number;
  op: ScenarioStep['op'];
  status: 'ok' | 'expected-error';
  result?: unknown;
  error?: { code: LedgerErrorCode; message: string };
}

export interface ScenarioReport {
  name: string;
  positionModel: LedgerState['positionModel'];
  issuancePolicy: LedgerState['issuancePolicy'];
  steps: StepOutcome[];
  state: LedgerState;
  positions: PositionJSON[];
  events: LedgerEvent[];
}

/**
 * A step failed unexpectedly, or succeeded where it was expected to fail
 */
export class ScenarioStepError extends Error {
  constructor(
    public readonly index: number,
    public readonly op: string,
    message: string
  ) {
    super(`Step ${index} (${op}): ${message}`);
    this.name = 'ScenarioStepError';
  }
}

/**
 * Run a scenario.
 *
 * @param baseEnv - Environment the scenario's own `env` is layered over
 * @throws ScenarioStepError at the first step that does not go as scripted
 */
export function runScenario(
  scenario: Scenario,
  baseEnv: NodeJS.ProcessEnv = process.env
): ScenarioReport {
  const config = loadLedgerConfig({ ...baseEnv, ...scenario.env });
  const deployment = createInMemoryDeployment(config, { startTime: scenario.startTime });

  for (const { account, amount } of scenario.funding) {
    deployment.baseAsset.deposit(account, amount);
  }

  const steps = scenario.steps.map((step, index) => runStep(deployment, step, index));
  const { ledger, publisher } = deployment;
  const state = ledger.state();

  const positions: PositionJSON[] = [];
  for (let id = 1n; id < state.nextPositionId; id++) {
    positions.push(positionToJSON(ledger.getPosition(id)));
  }

  return {
    name: scenario.name,
    positionModel: state.positionModel,
    issuancePolicy: state.issuancePolicy,
    steps,
    state,
    positions,
    events: publisher.events(),
  };
}

function runStep(deployment: InMemoryDeployment, step: ScenarioStep, index: number): StepOutcome {
  let result: unknown;
  try {
    result = applyStep(deployment, step);
  } catch (error) {
    if (step.expectError !== undefined && isLedgerError(error, step.expectError)) {
      return {
        index,
        op: step.op,
        status: 'expected-error',
        error: { code: error.code, message: error.message },
      };
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ScenarioStepError(index, step.op, message);
  }

  if (step.expectError !== undefined) {
    throw new ScenarioStepError(index, step.op, `expected ${step.expectError} but the step succeeded`);
  }
  return { index, op: step.op, status: 'ok', result };
}

function applyStep(deployment: InMemoryDeployment, step: ScenarioStep): unknown {
  const { ledger, clock, baseAsset, principalClaim, yieldClaim } = deployment;

  switch (step.op) {
    case 'stake':
      return ledger.stake(step.caller, {
        amount: step.amount,
        lockupDays: step.lockupDays,
        positionOwner: step.positionOwner,
        principalRecipient: step.principalRecipient,
        yieldRecipient: step.yieldRecipient,
      });
    case 'unstake':
      return ledger.unstake(step.caller, step.positionId);
    case 'redeem':
      return ledger.redeem(step.caller, step.positionId, step.share);
    case 'extend':
      return ledger.extendLockTime(step.caller, step.positionId, step.extendDays);
    case 'withdrawYield':
      return { yieldAmount: ledger.withdrawYield(step.caller, step.yieldClaim) };
    case 'reportYield':
      baseAsset.reportYield(step.amount);
      return { totalYieldPool: ledger.state().totalYieldPool };
    case 'advance': {
      if (step.days === undefined && step.seconds === undefined) {
        throw new Error('advance needs days or seconds');
      }
      const seconds = (step.days ?? 0n) * SECONDS_PER_DAY + (step.seconds ?? 0n);
      return { now: clock.advance(seconds) };
    }
    case 'setParameter':
      applyParameter(deployment, step);
      return { [step.name]: ledger.parameters.get(step.name) };
    case 'transfer': {
      const token = { baseAsset, principalClaim, yieldClaim }[step.token];
      token.transfer(step.from, step.to, step.amount);
      return undefined;
    }
  }
}

function applyParameter(
  deployment: InMemoryDeployment,
  step: Extract<ScenarioStep, { op: 'setParameter' }>
): void {
  const { parameters } = deployment.ledger;
  const { caller, name, value } = step;

  switch (name) {
    case 'revenuePool':
      parameters.setRevenuePool(caller, value);
      return;
    case 'yieldReporter':
      parameters.setYieldReporter(caller, value);
      return;
  }

  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer string, got "${value}"`);
  }
  const amount = BigInt(value);
  switch (name) {
    case 'minLockupDays':
      return parameters.setMinLockupDays(caller, amount);
    case 'maxLockupDays':
      return parameters.setMaxLockupDays(caller, amount);
    case 'minStake':
      return parameters.setMinStake(caller, amount);
    case 'forceUnstakeFeeRate':
      return parameters.setForceUnstakeFeeRate(caller, amount);
    case 'burnedYieldClaimFeeRate':
      return parameters.setBurnedYieldClaimFeeRate(caller, amount);
  }
}
