#!/usr/bin/env ts-node
/**
 * Local Deployment Rehearsal
 *
 * Runs a webhook-style event file through the orchestrator with the dry-run
 * executor, an in-memory ledger and log-only notifications. With --ledger the
 * ledger is loaded from and saved back to a JSON file, so repeat runs show the
 * "Already executed" path.
 *
 * Usage:
 *   npm run deploy:local -- <event.json> [--ledger ledger.json]
 *
 * Environment variables (from .env.local / .env):
 *   - MAX_SQL_AGE_MONTHS, DEPLOYMENT_ROOT_SEGMENT, DEPLOYMENT_ID_PATTERN, ...
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../services/core/Logger';
import { loadDeploymentConfig, orchestratorOptionsFromConfig } from '../config/deploymentConfig';
import { SqlDeploymentOrchestrator } from '../services/deployment/SqlDeploymentOrchestrator';
import { InMemoryExecutionLedger } from '../services/ledger/InMemoryExecutionLedger';
import { DryRunScriptExecutor } from '../services/execution/DryRunScriptExecutor';
import { LoggingNotifier } from '../services/notification/LoggingNotifier';
import { SqlDeploymentEventSchema, toScriptFiles } from '../handlers/deployment/event-schema';

for (const envFile of ['.env.local', '.env']) {
  const envPath = path.join(__dirname, '../..', envFile);
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

const ExecutionRecordSchema = z.object({
  deployment_id: z.string(),
  script_name: z.string(),
  script_path: z.string(),
  deployed_at: z.string(),
  status: z.enum(['SUCCESS', 'FAILED', 'IGNORED']),
  failure_reason: z.string().optional(),
});

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let eventPath: string | undefined;
  let ledgerPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--ledger' && i + 1 < args.length) {
      ledgerPath = args[i + 1];
      i++;
    } else if (!eventPath) {
      eventPath = args[i];
    }
  }

  if (!eventPath) {
    console.error('Usage: run-local-deployment <event.json> [--ledger ledger.json]');
    process.exit(1);
  }

  const logger = new Logger('LocalDeployment');
  const config = loadDeploymentConfig();
  const event = SqlDeploymentEventSchema.parse(readJson(eventPath));

  const seed =
    ledgerPath && fs.existsSync(ledgerPath)
      ? z.array(ExecutionRecordSchema).parse(readJson(ledgerPath))
      : [];
  const ledger = new InMemoryExecutionLedger(seed);

  const orchestrator = new SqlDeploymentOrchestrator({
    ledger,
    executor: new DryRunScriptExecutor(logger),
    notifier: new LoggingNotifier(logger),
    logger,
    options: orchestratorOptionsFromConfig(config),
  });

  const result = await orchestrator.run(toScriptFiles(event));

  console.log(`\nResult: ${result.status}`);
  for (const record of ledger.records()) {
    const reason = record.failure_reason ? ` (${record.failure_reason})` : '';
    console.log(`  ${record.status.padEnd(7)} ${record.deployment_id}/${record.script_name}${reason}`);
  }

  if (ledgerPath) {
    fs.writeFileSync(ledgerPath, JSON.stringify(ledger.records(), null, 2));
    console.log(`\nLedger saved to ${ledgerPath}`);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Local deployment failed:', error);
    process.exit(1);
  });
}
