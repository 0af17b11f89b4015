import type { Logger } from 'pino';
import type { AlertNotifier } from '../domain/index.js';
import type { AlertEvent } from './alert-schema.js';

const LEVEL_EMOJI: Record<string, string> = {
  error: '🔴',
  warning: '🟡',
  info: '🔵',
  debug: '⚪',
  fatal: '💥',
};

const DEFAULT_EMOJI = '⚠️';

export function severityEmoji(level: string): string {
  return LEVEL_EMOJI[level] ?? DEFAULT_EMOJI;
}

function environmentOf(event: AlertEvent): string {
  const tag = event.tags?.find(([key]) => key === 'environment');
  return tag?.[1] ?? 'unknown';
}

/** Renders the chat message for one alert. */
export function formatAlertSummary(event: AlertEvent): string {
  const level = event.level ?? 'unknown';
  const lines = [
    `${severityEmoji(level)} *Sentry Alert*`,
    '',
    `*Title:* ${event.title ?? 'N/A'}`,
    `*Level:* ${level}`,
    `*Platform:* ${event.platform ?? 'unknown'}`,
    `*Environment:* ${environmentOf(event)}`,
    `*Project:* ${event.project ?? 'unknown'}`,
    `*Release:* ${event.release ?? 'unknown'}`,
    `*User ID:* ${event.user?.id ?? 'N/A'}`,
    `*URL:* ${event.web_url ?? 'N/A'}`,
  ];
  return lines.join('\n');
}

/**
 * Forwards an alert summary to the chat notifier.
 *
 * With no notifier configured the alert is dropped at debug level.
 * Notifier failures propagate to the caller.
 */
export async function relayAlert(
  event: AlertEvent,
  notifier: AlertNotifier | null,
  log: Logger,
): Promise<void> {
  if (notifier === null) {
    log.debug('Chat webhook not configured, alert not relayed');
    return;
  }

  await notifier.notify(formatAlertSummary(event));
  log.info({ title: event.title, level: event.level }, 'Alert relayed');
}
