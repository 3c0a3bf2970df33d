#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { randomUUID } from 'crypto';
import { loadConfig } from './config.js';
import {
  createServices,
  healthReport,
  parseToolArguments,
  readTicketFile,
  type ServiceOverrides,
} from './services.js';
import { runSupportSwarm } from './swarm/orchestrator.js';
import { executeGatewayRequest } from './gateway/operations.js';
import { GatewayOperationSchema } from './contracts/tool.js';
import type { SwarmRunResult } from './contracts/swarm-run.js';
import { ExitCode, toSwarmException } from './runner/errors.js';
import { SwarmLogger } from './runner/logger.js';

interface GlobalOptions {
  json?: boolean;
}

interface RunOptions {
  kb?: string;
}

interface ToolsOptions {
  args: string;
}

interface SearchOptions {
  kb?: string;
  limit: string;
}

const program = new Command();

program
  .name('support-swarm')
  .description('Four-stage support ticket pipeline with optional remote tools')
  .version('0.1.0')
  .option('--json', 'Emit machine-readable JSON only');

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function services(overrides: ServiceOverrides = {}) {
  const config = loadConfig();
  const logger = new SwarmLogger({
    level: config.logging.level,
    logPath: config.logging.logPath,
    json: globalOptions().json === true,
  });
  return createServices(config, { logger, ...overrides });
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printRunSummary(result: SwarmRunResult): void {
  const escalation = result.escalation.escalate
    ? chalk.yellow(`escalated to ${result.escalation.route_to}`)
    : chalk.green('handled autonomously');

  console.log(chalk.blue('Ticket:'), result.ticket_id, chalk.gray(`(trace ${result.trace_id})`));
  console.log(chalk.blue('Urgency:'), `${result.triage.urgency} / SLA ${result.triage.sla_target_minutes} min`);
  console.log(chalk.blue('Escalation:'), escalation);
  for (const action of [...result.research.tool_actions, ...result.escalation.tool_actions]) {
    console.log(chalk.gray(`  ${action}`));
  }
  console.log(chalk.cyan('\n--- RESPONSE ---'));
  console.log(result.response.subject);
  console.log(result.response.message);
  console.log(chalk.cyan('--- END RESPONSE ---\n'));
}

/**
 * Print the error envelope with a fresh trace id and exit with its code.
 */
function fail(error: unknown): never {
  const exception = toSwarmException(error);
  const envelope = exception.toEnvelope(randomUUID());

  if (globalOptions().json === true) {
    console.error(JSON.stringify(envelope));
  } else {
    console.error(chalk.red(`Error: ${envelope.userMessage}`));
    console.error(chalk.gray(`${envelope.code}: ${envelope.message} (trace ${envelope.traceId ?? 'n/a'})`));
  }
  process.exit(exception.exitCode);
}

program
  .command('run')
  .description('Run the support pipeline for one ticket')
  .argument('<ticket.json>', 'Path to a JSON ticket')
  .option('--kb <dir>', 'Directory of markdown/text knowledge documents')
  .action(async (ticketPath: string, options: RunOptions) => {
    try {
      const { knowledge, gateway, augmenter, logger, config } = await services({ knowledgeDir: options.kb });
      const ticket = await readTicketFile(ticketPath);
      const result = await runSupportSwarm(ticket, {
        knowledge,
        gateway,
        augmenter,
        logger,
        notifyTo: config.escalation.notifyTo,
      });

      if (globalOptions().json === true) {
        print(result);
      } else {
        printRunSummary(result);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('tools')
  .description('Talk to the configured tool server')
  .argument('<operation>', 'list | describe | invoke')
  .argument('[name]', 'Tool name for describe and invoke')
  .option('--args <json>', 'Tool arguments as a JSON object', '{}')
  .action(async (operation: string, name: string | undefined, options: ToolsOptions) => {
    try {
      const { gateway } = await services();
      const response = await executeGatewayRequest(gateway, {
        operation: GatewayOperationSchema.parse(operation === 'list' ? 'list_tools' : `${operation}_tool`),
        name,
        arguments: parseToolArguments(options.args),
      });
      print(response);
    } catch (error) {
      fail(error);
    }
  });

const kb = program.command('kb').description('Knowledge store commands');

kb.command('search')
  .description('Search the knowledge store')
  .argument('<query>', 'Free-text query')
  .option('--kb <dir>', 'Directory of markdown/text knowledge documents')
  .option('--limit <n>', 'Maximum hits', '3')
  .action(async (query: string, options: SearchOptions) => {
    try {
      const { knowledge } = await services({ knowledgeDir: options.kb });
      const limit = Number.parseInt(options.limit, 10);
      const hits = await knowledge.search(query, Number.isNaN(limit) ? 3 : limit);

      if (globalOptions().json === true) {
        print(hits);
        return;
      }
      if (hits.length === 0) {
        console.log(chalk.yellow('No knowledge matched.'));
      }
      for (const hit of hits) {
        console.log(`${chalk.blue(`[${hit.source}]`)} ${hit.content}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('health')
  .description('Report knowledge and tool server status')
  .action(async () => {
    try {
      const report = healthReport(await services());
      if (globalOptions().json === true) {
        print(report);
        return;
      }
      console.log(chalk.blue('Knowledge documents:'), report.knowledge_documents);
      console.log(chalk.blue('Tools:'), report.tools_enabled ? chalk.green('enabled') : chalk.gray('disabled'));
      console.log(
        chalk.blue('Augmentation:'),
        report.augmentation_enabled ? chalk.green('enabled') : chalk.gray('disabled')
      );
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Unexpected error:'), error);
  process.exitCode = ExitCode.UnexpectedBug;
});
