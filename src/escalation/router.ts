import type { TicketRequest } from '../contracts/ticket.js';
import type { TriageResult } from '../contracts/triage-result.js';
import type { EscalationDecision, RouteTarget } from '../contracts/escalation.js';
import type { ToolDocument } from '../contracts/tool.js';
import {
  NOTIFY_TOOL_KEYWORDS,
  TICKET_UPDATE_TOOL_KEYWORDS,
  findToolByKeywords,
} from '../gateway/resolver.js';
import { safeInvokeTool } from '../gateway/safe-invoke.js';
import { gatewayEnabled, type StageContext } from '../swarm/stage-context.js';

export const DEFAULT_NOTIFY_TO = 'support-leads@example.com';

export interface EscalationOptions {
  /** Recipient of escalation notifications sent through a notify tool. */
  notifyTo?: string;
}

interface Route {
  routeTo: Exclude<RouteTarget, 'none'>;
  reason: string;
}

const BILLING_KEYWORDS = ['billing', 'invoice', 'refund'];

/**
 * Decision tree, first match wins. `null` means the ticket stays on the
 * autonomous path.
 */
export function chooseRoute(ticket: TicketRequest, triage: TriageResult): Route | null {
  const text = ticket.message.toLowerCase();

  if (text.includes('security') || text.includes('breach')) {
    return { routeTo: 'security_specialist', reason: 'Security indicators found in ticket.' };
  }
  if (
    BILLING_KEYWORDS.some(kw => text.includes(kw)) &&
    (triage.urgency === 'high' || triage.urgency === 'critical')
  ) {
    return { routeTo: 'billing_specialist', reason: 'High-priority billing issue needs specialist ownership.' };
  }
  if (triage.urgency === 'critical') {
    return { routeTo: 'human_support_lead', reason: 'Critical severity requires immediate human oversight.' };
  }
  return null;
}

async function invokeByKeywords(
  context: StageContext,
  keywords: readonly string[],
  args: ToolDocument,
): Promise<string | null> {
  if (!gatewayEnabled(context)) {
    return null;
  }
  const tool = await findToolByKeywords(context.gateway, keywords, context.logger);
  if (tool === null) {
    return null;
  }
  const result = await safeInvokeTool(context.gateway, tool.name, args, context.logger);
  return result !== null ? `Invoked tool: ${tool.name}` : null;
}

/**
 * Mark the ticket escalated and notify the owners, best effort.
 */
async function operationalize(
  ticket: TicketRequest,
  routeTo: Route['routeTo'],
  context: StageContext,
  notifyTo: string,
): Promise<string[]> {
  const actions: string[] = [];

  const updated = await invokeByKeywords(context, TICKET_UPDATE_TOOL_KEYWORDS, {
    ticket_id: ticket.ticket_id,
    status: 'escalated',
    route_to: routeTo,
  });
  if (updated !== null) {
    actions.push(updated);
  }

  const notified = await invokeByKeywords(context, NOTIFY_TOOL_KEYWORDS, {
    to: notifyTo,
    subject: `Escalation required for ${ticket.ticket_id}`,
    body: `Ticket routed to ${routeTo}. Message: ${ticket.message}`,
  });
  if (notified !== null) {
    actions.push(notified);
  }

  return actions;
}

export async function decideEscalation(
  ticket: TicketRequest,
  triage: TriageResult,
  context: StageContext,
  options: EscalationOptions = {},
): Promise<EscalationDecision> {
  const route = chooseRoute(ticket, triage);

  if (route === null) {
    return {
      escalate: false,
      route_to: 'none',
      reason: 'Autonomous resolution path is acceptable.',
      tool_actions: [],
    };
  }

  const toolActions = gatewayEnabled(context)
    ? await operationalize(ticket, route.routeTo, context, options.notifyTo ?? DEFAULT_NOTIFY_TO)
    : [];

  context.logger.info('escalation.routed', `Escalating to ${route.routeTo}`, {
    routeTo: route.routeTo,
    toolActions: toolActions.length,
  });

  return {
    escalate: true,
    route_to: route.routeTo,
    reason: route.reason,
    tool_actions: toolActions,
  };
}
