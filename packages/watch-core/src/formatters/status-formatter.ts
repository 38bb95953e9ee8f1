/**
 * Status Formatter
 *
 * Plain-text reports for the command line.
 */

import type { CheckEvent, CycleResult, HistorySummary } from '../types/index.js';
import { formatDuration, formatPercent, orDash } from './utils.js';

/**
 * Format the outcome of one check cycle
 */
export function formatCycleResult(result: CycleResult): string {
  const lines: string[] = [];

  lines.push(`## Check Result (${result.mode})`);
  lines.push(`Time: ${result.timestamp.toISOString()}`);
  lines.push(`Public IP: ${orDash(result.publicIp)}`);
  lines.push(`Local IP: ${orDash(result.localIp)}`);
  if (result.ipChanged) {
    lines.push(`Changed: yes (previous: ${orDash(result.previousPublicIp)})`);
  } else {
    lines.push(`Changed: no`);
  }
  lines.push(`Notification: ${describeNotification(result)}`);
  if (result.mode !== 'test') {
    lines.push(`Recorded: ${result.recorded ? 'yes' : 'no'}`);
  }
  lines.push(`Duration: ${formatDuration(result.durationSeconds)}`);

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(`### Failures`);
    for (const failure of result.failures) {
      lines.push(`- [${failure.stage}] ${failure.code}: ${failure.message}`);
    }
  }

  lines.push('');
  lines.push(result.success ? 'Status: OK' : 'Status: FAILED');

  return lines.join('\n');
}

function describeNotification(result: CycleResult): string {
  if (!result.shouldNotify) return 'not needed';
  return result.notificationSent ? 'sent' : 'not sent';
}

/**
 * Format the history summary shown by the status command
 */
export function formatHistorySummary(summary: HistorySummary): string {
  const lines: string[] = [];
  const { current, statistics, metadata } = summary;

  lines.push(`## IP History`);
  lines.push(`Current public IP: ${orDash(current.publicIp)}`);
  lines.push(`Current local IP: ${orDash(current.localIp)}`);
  lines.push(`Last updated: ${current.lastUpdated}`);
  lines.push(`Last notification: ${orDash(current.lastNotificationSent)}`);
  lines.push('');

  lines.push(`### Statistics`);
  lines.push(`- Total checks: ${metadata.totalChecks}`);
  lines.push(`- IP changes: ${statistics.totalIpChanges}`);
  lines.push(`- Notifications sent: ${statistics.totalNotificationsSent}`);
  lines.push(`- Last change: ${orDash(statistics.lastChangeDate)}`);
  for (const [mode, count] of Object.entries(statistics.checkFrequencyByMode)) {
    const pct = summary.frequencyPercentage[mode];
    lines.push(`- ${mode}: ${count}${pct !== undefined ? ` (${formatPercent(pct)})` : ''}`);
  }
  lines.push('');

  lines.push(`### Recent Activity`);
  if (summary.recentActivity.length === 0) {
    lines.push(`No checks recorded.`);
  } else {
    for (const event of summary.recentActivity) {
      const flags = [event.ipChanged ? 'changed' : null, event.notificationSent ? 'notified' : null]
        .filter((f): f is string => f !== null)
        .join(', ');
      lines.push(`- ${event.timestamp} ${event.mode} ${orDash(event.publicIp)}${flags ? ` (${flags})` : ''}`);
    }
  }
  lines.push('');

  lines.push(`---`);
  lines.push(`Events retained: ${summary.totalEventRecords}, file size: ${summary.historyFileSize}`);

  return lines.join('\n');
}

/**
 * Format IP changes within a window, newest first
 */
export function formatChangeTimeline(events: CheckEvent[], days: number): string {
  const lines = [`### IP Changes (last ${days} days)`];
  if (events.length === 0) {
    lines.push('No changes.');
  }
  for (const event of events) {
    lines.push(`- ${event.timestamp} ${orDash(event.previousPublicIp)} -> ${orDash(event.publicIp)} (${event.mode})`);
  }
  return lines.join('\n');
}
