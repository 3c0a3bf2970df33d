import type { ToolDescriptor, ToolDocument } from '../contracts/tool.js';
import { parseToolDescriptors } from '../contracts/tool.js';
import { ConfigurationError, GatewayError, describeError } from '../runner/errors.js';
import { SwarmLogger } from '../runner/logger.js';
import { describeToolConventions, invokeToolConventions, listToolsConventions } from './conventions.js';
import {
  isToolDocument,
  readEventStreamPayload,
  readLines,
  type FetchLike,
  type ConventionStrategy,
} from './transport.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 12_000;

export interface ToolGatewayClientOptions {
  /** Tool server base address; absent or empty disables the client. */
  baseUrl?: string;
  /** Budget for each individual convention attempt. */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: SwarmLogger;
}

/**
 * Discovers, describes and invokes tools on a server whose calling convention
 * is unknown until one of them answers.
 *
 * Every call walks its convention table from the top and adopts the first
 * candidate that answers with a well-formed document. The winning convention
 * is not remembered between calls, so a call can cost up to
 * `conventions × timeoutMs` against a server that answers none of them.
 */
export class ToolGatewayClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: SwarmLogger;

  constructor(options: ToolGatewayClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? '').trim().replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? SwarmLogger.silent();
  }

  get enabled(): boolean {
    return this.baseUrl.length > 0;
  }

  /**
   * Tools advertised by the server. Resolves an empty list when no convention
   * yields any tool; rejects only when the client is disabled.
   */
  async listTools(): Promise<ToolDescriptor[]> {
    this.assertEnabled('list_tools');

    try {
      return await this.tryConventions('list tools', listToolsConventions(), document => {
        const tools = parseToolDescriptors(document.tools);
        return tools.length > 0 ? tools : null;
      });
    } catch (error) {
      if (error instanceof GatewayError) {
        return [];
      }
      throw error;
    }
  }

  async describeTool(name: string): Promise<ToolDocument> {
    this.assertEnabled('describe_tool');
    return this.tryConventions(`describe tool '${name}'`, describeToolConventions(name), document => document);
  }

  async invokeTool(name: string, args: ToolDocument = {}): Promise<ToolDocument> {
    this.assertEnabled('invoke_tool');
    return this.tryConventions(`invoke tool '${name}'`, invokeToolConventions(name, args), document => document);
  }

  private assertEnabled(operation: string): void {
    if (!this.enabled) {
      throw new ConfigurationError('Tool server URL is not configured.', { operation });
    }
  }

  /**
   * Try each strategy in order; the first one whose document `accept` takes wins.
   */
  private async tryConventions<T>(
    label: string,
    strategies: readonly ConventionStrategy[],
    accept: (document: ToolDocument) => T | null,
  ): Promise<T> {
    let lastError: GatewayError | undefined;

    for (const strategy of strategies) {
      try {
        const value = accept(await this.attempt(strategy));
        if (value !== null) {
          this.logger.debug('gateway.convention_selected', `Tool server answered ${strategy.method} ${strategy.path}`, {
            path: strategy.path,
            mode: strategy.mode,
          });
          return value;
        }
        lastError = new GatewayError(`Unusable response from ${strategy.path}`, strategy.path);
      } catch (error) {
        if (!(error instanceof GatewayError)) {
          throw error;
        }
        lastError = error;
      }

      this.logger.debug('gateway.attempt_failed', lastError.message, {
        path: strategy.path,
        mode: strategy.mode,
      });
    }

    const lastPath = lastError?.path ?? strategies[strategies.length - 1]?.path ?? '';
    this.logger.warn('gateway.exhausted', `Unable to ${label}: no calling convention succeeded`, {
      lastPath,
      attempts: strategies.length,
    });
    throw new GatewayError(`Unable to ${label}.`, lastPath, lastError);
  }

  private async attempt(strategy: ConventionStrategy): Promise<ToolDocument> {
    const { path } = strategy;
    const streaming = strategy.mode === 'event-stream';
    const headers: Record<string, string> = {
      Accept: streaming ? 'text/event-stream' : 'application/json',
    };
    if (strategy.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: strategy.method,
        headers,
        body: strategy.body !== undefined ? JSON.stringify(strategy.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new GatewayError(`Request failed for ${path}: ${describeError(error)}`, path, error);
    }

    if (!response.ok) {
      await response.body?.cancel().catch((error: unknown) => {
        this.logger.debug('gateway.body_cancel_failed', describeError(error), { path });
      });
      throw new GatewayError(`Request failed for ${path}: HTTP ${response.status}`, path);
    }

    return streaming ? this.readStream(path, response) : this.readJson(path, response);
  }

  private async readJson(path: string, response: Response): Promise<ToolDocument> {
    let data: unknown;
    try {
      data = JSON.parse(await response.text());
    } catch (error) {
      throw new GatewayError(`Invalid JSON from ${path}: ${describeError(error)}`, path, error);
    }
    return isToolDocument(data) ? data : { data };
  }

  private async readStream(path: string, response: Response): Promise<ToolDocument> {
    if (response.body === null) {
      throw new GatewayError(`Empty event stream from ${path}`, path);
    }

    let payload: ToolDocument | null;
    try {
      payload = await readEventStreamPayload(readLines(response.body), skipped => {
        this.logger.debug('gateway.stream_payload_skipped', `Skipping non-JSON event payload from ${path}`, {
          path,
          payload: skipped,
        });
      });
    } catch (error) {
      throw new GatewayError(`Event stream from ${path} failed: ${describeError(error)}`, path, error);
    }

    if (payload === null) {
      throw new GatewayError(`No JSON event payload returned by ${path}`, path);
    }
    return payload;
  }
}
