import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { loadLedgerConfig } from '@tidelock/services';
import { parseScenario } from '../scenario/schema.js';
import { runScenario } from '../scenario/runner.js';
import { formatState, toJson } from '../output.js';

export const simulateCommand = new Command('simulate')
  .description('Replay a JSON scenario against an in-memory ledger')
  .argument('<scenario>', 'Path to the scenario JSON file')
  .option('--json', 'Print the full report as JSON')
  .action((path: string, options: { json?: boolean }) => {
    try {
      const scenario = parseScenario(JSON.parse(readFileSync(path, 'utf8')));
      const report = runScenario(scenario, process.env);

      if (options.json) {
        console.log(toJson(report));
        return;
      }

      const { asset } = loadLedgerConfig({ ...process.env, ...scenario.env });
      console.log(`\n🌊 Scenario: ${report.name}\n`);
      for (const step of report.steps) {
        const marker = step.status === 'ok' ? '✅' : '⛔';
        const detail = step.error ? ` ${step.error.code}: ${step.error.message}` : '';
        console.log(`   ${marker} #${step.index} ${step.op}${detail}`);
      }

      console.log('\n📊 Final state\n');
      for (const line of formatState(report.state, asset)) {
        console.log(line);
      }
      console.log(`\n📨 ${report.events.length} event(s) published`);
      for (const event of report.events) {
        console.log(`   ${event.type} ${event.entityId}`);
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
  });
