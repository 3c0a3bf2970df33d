import { readFile } from 'fs/promises';
import type { SwarmConfig } from './config.js';
import { validateTicketRequest, type TicketRequest } from './contracts/ticket.js';
import { ToolDocumentSchema, type ToolDocument } from './contracts/tool.js';
import { createAugmenter, noAugmentation, type Augmenter } from './augment/augmenter.js';
import { ToolGatewayClient } from './gateway/client.js';
import type { FetchLike } from './gateway/transport.js';
import { InMemoryKnowledgeStore } from './kb/store.js';
import { ingestDirectory } from './kb/ingest.js';
import { ExitCode, SwarmException, describeError } from './runner/errors.js';
import { SwarmLogger } from './runner/logger.js';

export interface SwarmServices {
  config: SwarmConfig;
  logger: SwarmLogger;
  knowledge: InMemoryKnowledgeStore;
  gateway: ToolGatewayClient;
  augmenter: Augmenter;
}

export interface ServiceOverrides {
  /** Takes precedence over `KB_DIR`. */
  knowledgeDir?: string;
  logger?: SwarmLogger;
  fetch?: FetchLike;
  /** Skip the chat augmenter even when a key is configured. */
  offline?: boolean;
}

/**
 * Process-wide construction: one store, one gateway client and one augmenter
 * shared by every run.
 */
export async function createServices(config: SwarmConfig, overrides: ServiceOverrides = {}): Promise<SwarmServices> {
  const logger = overrides.logger ?? new SwarmLogger({ level: config.logging.level, logPath: config.logging.logPath });

  const knowledge = new InMemoryKnowledgeStore();
  await knowledge.seedDefaults();

  const knowledgeDir = overrides.knowledgeDir ?? config.knowledge.directory;
  if (knowledgeDir !== undefined) {
    await knowledge.addDocuments(await ingestDirectory(knowledgeDir, { logger }));
  }

  const gateway = new ToolGatewayClient({
    baseUrl: config.toolServer.baseUrl,
    timeoutMs: config.toolServer.timeoutMs,
    fetch: overrides.fetch,
    logger,
  });

  const augmenter = overrides.offline === true ? noAugmentation : createAugmenter(config.augment, logger);

  return { config, logger, knowledge, gateway, augmenter };
}

export interface HealthReport {
  knowledge_documents: number;
  tools_enabled: boolean;
  augmentation_enabled: boolean;
}

export function healthReport(services: SwarmServices): HealthReport {
  return {
    knowledge_documents: services.knowledge.count(),
    tools_enabled: services.gateway.enabled,
    augmentation_enabled: services.augmenter !== noAugmentation,
  };
}

export async function readTicketFile(filePath: string): Promise<TicketRequest> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new SwarmException({
      code: 'INVALID_INPUT',
      message: `Cannot read ticket file ${filePath}: ${describeError(error)}`,
      userMessage: 'The ticket file could not be read as JSON.',
      cause: error,
      context: { filePath },
      exitCode: ExitCode.ValidationError,
    });
  }
  return validateTicketRequest(raw);
}

/**
 * Parse the operator's `--args` value; it must be a JSON object.
 */
export function parseToolArguments(raw: string): ToolDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw invalidArguments(`Tool arguments are not valid JSON: ${describeError(error)}`, error);
  }
  const document = ToolDocumentSchema.safeParse(parsed);
  if (!document.success) {
    throw invalidArguments('Tool arguments must be a JSON object');
  }
  return document.data;
}

function invalidArguments(message: string, cause?: unknown): SwarmException {
  return new SwarmException({
    code: 'INVALID_INPUT',
    message,
    userMessage: 'The tool arguments must be a JSON object.',
    cause,
    exitCode: ExitCode.ValidationError,
  });
}
