/**
 * Operator-facing alerts sent to the admin chat.
 * Without an admin chat configured, alerts are logged at error level only.
 */

import type { IMessagingProvider } from '../providers/IMessagingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Clock } from '../types/common.js';
import { errorMessage } from '../errors.js';
import { escapeHtml } from './ReportFormatter.js';

const MAX_LISTED_CHATS = 10;

export interface DeliveryFailureAlert {
  kind: 'delivery_failures';
  failedChatIds: number[];
  attempted: number;
}

export interface RunAbortedAlert {
  kind: 'run_aborted';
  reason: string;
  chatId: number;
}

export type Escalation = DeliveryFailureAlert | RunAbortedAlert;

export class EscalationNotifier {
  constructor(
    private readonly messaging: IMessagingProvider,
    private readonly logger: ILogProvider,
    private readonly clock: Clock,
    private readonly adminChatId: number | null
  ) {}

  /** Never throws: a failed alert is logged and swallowed after logging. */
  async notify(escalation: Escalation): Promise<boolean> {
    const text = renderEscalation(escalation, this.clock.now());
    this.logger.error('Escalation raised', { ...escalation });

    if (this.adminChatId === null) {
      this.logger.warn('No admin chat configured; escalation was only logged', {
        kind: escalation.kind,
      });
      return false;
    }

    try {
      await this.messaging.sendMessage(this.adminChatId, text);
      this.logger.info('Escalation sent', { adminChatId: this.adminChatId, kind: escalation.kind });
      return true;
    } catch (err) {
      this.logger.error('Failed to send escalation', {
        adminChatId: this.adminChatId,
        error: errorMessage(err),
      });
      return false;
    }
  }
}

export function renderEscalation(escalation: Escalation, at: Date): string {
  const time = `${at.toISOString().slice(0, 16).replace('T', ' ')} UTC`;

  if (escalation.kind === 'run_aborted') {
    return [
      '🚨 <b>Daily report run aborted</b>',
      `Reason: ${escapeHtml(escalation.reason)}`,
      `While processing chat: <code>${escalation.chatId}</code>`,
      `Time: ${time}`,
    ].join('\n');
  }

  const { failedChatIds, attempted } = escalation;
  const rate = attempted > 0 ? ((failedChatIds.length / attempted) * 100).toFixed(1) : '0.0';
  const listed = failedChatIds
    .slice(0, MAX_LISTED_CHATS)
    .map((id) => `• <code>${id}</code>`);
  if (failedChatIds.length > MAX_LISTED_CHATS) {
    listed.push(`… and ${failedChatIds.length - MAX_LISTED_CHATS} more`);
  }

  return [
    '🚨 <b>High report delivery failure rate</b>',
    `Failed: ${failedChatIds.length}/${attempted} chats (${rate}%)`,
    `Time: ${time}`,
    'Failed chat IDs:',
    ...listed,
  ].join('\n');
}
