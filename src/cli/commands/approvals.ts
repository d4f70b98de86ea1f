/**
 * `uplift approvals`: the human side of the approval queue.
 * Decisions go through the runtime when it is up, so waiting tasks are
 * released at once; otherwise they are written to the database directly.
 */

import { Command } from 'commander';
import { ApprovalService } from '../../approvals/service.js';
import type { ApprovalRequest } from '../../approvals/types.js';
import { ValidationError } from '../../core/errors.js';
import { RiskLevelSchema, type UpliftConfig } from '../../core/types.js';
import { formatDuration } from '../../utils/timer.js';
import { formatTimestamp, loadConfig, operatorClient, withDatabase, type ProjectOptions } from '../context.js';

export function createApprovalsCommand(): Command {
  const cmd = new Command('approvals');

  cmd.description('Review and decide approval requests');

  cmd
    .command('list')
    .description('List pending requests')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: ProjectOptions) => {
      const pending = withService(loadConfig(options), service => service.listPending());
      if (pending.length === 0) {
        console.log('\n✅ No pending approval requests\n');
        return;
      }
      console.log();
      console.log(`⏳ ${pending.length} pending request(s)`);
      console.log('─'.repeat(60));
      for (const request of pending) printRequest(request);
    });

  cmd
    .command('request')
    .description('File a request by hand')
    .requiredOption('--agent <agent>', 'Requesting agent')
    .requiredOption('--action <action>', 'Action needing approval')
    .option('--risk <level>', 'low | medium | high | critical', 'medium')
    .option('--category <category>', 'Free-form category')
    .option('--details <json>', 'JSON object with request details')
    .option('--timeout <seconds>', 'Override the risk level timeout', Number)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: RequestOptions) => {
      const risk = RiskLevelSchema.safeParse(options.risk);
      if (!risk.success) throw new ValidationError(`Invalid risk level: ${options.risk}`);
      const request = withService(loadConfig(options), service => service.requestApproval({
        agent: options.agent,
        action: options.action,
        riskLevel: risk.data,
        category: options.category,
        details: parseDetails(options.details),
        timeoutSeconds: options.timeout,
      }));
      console.log(`\n📝 Created ${request.id} (expires ${formatTimestamp(request.timeoutAt)})\n`);
    });

  cmd
    .command('approve <id>')
    .description('Approve a request')
    .option('--by <name>', 'Approver', process.env.USER ?? 'operator')
    .option('--comment <text>', 'Comment')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (id: string, options: ProjectOptions & { by: string; comment?: string }) => {
      const config = loadConfig(options);
      const client = operatorClient(config);
      if (await client.isReachable()) {
        await client.approve(id, options.by, options.comment);
      } else {
        withService(config, service => service.approve(id, options.by, options.comment));
      }
      console.log(`\n✅ Approved ${id}\n`);
    });

  cmd
    .command('deny <id>')
    .description('Deny a request')
    .option('--by <name>', 'Approver', process.env.USER ?? 'operator')
    .option('--reason <text>', 'Reason')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (id: string, options: ProjectOptions & { by: string; reason?: string }) => {
      const config = loadConfig(options);
      const client = operatorClient(config);
      if (await client.isReachable()) {
        await client.deny(id, options.by, options.reason);
      } else {
        withService(config, service => service.deny(id, options.by, options.reason));
      }
      console.log(`\n❌ Denied ${id}\n`);
    });

  cmd
    .command('status <id>')
    .description('Show a request and its audit trail')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((id: string, options: ProjectOptions) => {
      withService(loadConfig(options), service => {
        const request = service.requireRequest(id);
        console.log();
        printRequest(request);
        console.log('  Audit trail:');
        for (const entry of service.auditTrail(id)) {
          console.log(`    ${formatTimestamp(entry.timestamp)}  ${entry.action.padEnd(10)} ${entry.user ?? ''}`);
        }
        console.log();
      });
    });

  cmd
    .command('history')
    .description('Requests from the last N days')
    .option('--days <days>', 'Days to look back', Number, 30)
    .option('-n, --limit <count>', 'Max requests', Number, 100)
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: ProjectOptions & { days: number; limit: number }) => {
      const requests = withService(loadConfig(options), service => service.history(options.days, options.limit));
      console.log();
      console.log(`📜 ${requests.length} request(s) in the last ${options.days} days`);
      console.log('─'.repeat(60));
      for (const request of requests) printRequest(request);
    });

  return cmd;
}

interface RequestOptions extends ProjectOptions {
  agent: string;
  action: string;
  risk: string;
  category?: string;
  details?: string;
  timeout?: number;
}

function withService<T>(config: UpliftConfig, fn: (service: ApprovalService) => T): T {
  return withDatabase(config, db => fn(new ApprovalService(db, { settings: config.approvals })));
}

function parseDetails(raw: string | undefined): Record<string, unknown> | undefined {
  if (raw === undefined) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError('--details must be valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('--details must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

function printRequest(request: ApprovalRequest): void {
  const icons: Record<string, string> = {
    pending: '⏳',
    approved: '✅',
    denied: '❌',
    expired: '⌛',
    cancelled: '🚫',
  };
  console.log(`  ${icons[request.status] ?? '❓'} ${request.id}  [${request.riskLevel}]  ${request.status}`);
  console.log(`     ${request.agent} → ${request.action}`);
  if (request.status === 'pending') {
    console.log(`     expires in ${formatDuration(Math.max(request.timeoutAt - Date.now(), 0))}`);
  }
  if (request.approvedBy) console.log(`     decided by ${request.approvedBy}`);
  if (request.denialReason) console.log(`     reason: ${request.denialReason}`);
  if (request.comment) console.log(`     comment: ${request.comment}`);
  if (Object.keys(request.details).length > 0) console.log(`     details: ${JSON.stringify(request.details)}`);
  console.log();
}
