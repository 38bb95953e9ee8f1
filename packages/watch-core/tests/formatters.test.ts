import { describe, expect, it } from 'vitest';
import { WatchError } from '@ipwatch/core';
import {
  NotificationFormatter,
  findUnknownPlaceholders,
} from '../src/formatters/notification-formatter.js';
import {
  formatChangeTimeline,
  formatCycleResult,
  formatHistorySummary,
} from '../src/formatters/status-formatter.js';
import { createEmptyHistory } from '../src/history/history-record.js';
import type { CheckDecision, CycleResult, HistorySummary } from '../src/types/index.js';

const decision: CheckDecision = {
  mode: 'manual',
  timestamp: new Date('2026-03-01T09:00:00.000Z'),
  publicIp: '1.2.3.4',
  ipChanged: true,
  shouldNotify: true,
};

describe('NotificationFormatter', () => {
  it('renders the default template', () => {
    expect(new NotificationFormatter().render(decision)).toBe('Minecraft Server IP: 1.2.3.4:25565');
  });

  it('fills every placeholder', () => {
    const formatter = new NotificationFormatter({
      template: '{mode} {ip} {localIp} {previousIp} {timestamp}',
    });

    expect(formatter.render(decision)).toBe('manual 1.2.3.4 unknown none 2026-03-01T09:00:00.000Z');
    expect(
      formatter.render({ ...decision, localIp: '192.168.1.10', previousPublicIp: '5.6.7.8' })
    ).toBe('manual 1.2.3.4 192.168.1.10 5.6.7.8 2026-03-01T09:00:00.000Z');
  });

  it('rejects unknown placeholders up front', () => {
    expect(() => new NotificationFormatter({ template: 'Join {ip}:{port}' })).toThrow(WatchError);
    expect(() => new NotificationFormatter({ template: '  ' })).toThrow('Message template is empty');
    expect(findUnknownPlaceholders('{ip} {port} {port} {host}')).toEqual(['port', 'host']);
    expect(findUnknownPlaceholders('payload {"a": 1}')).toEqual([]);
  });

  it('enforces the message length limit', () => {
    expect(new NotificationFormatter({ template: 'x'.repeat(2000) }).render(decision)).toHaveLength(2000);

    try {
      new NotificationFormatter({ template: 'x'.repeat(2001) }).render(decision);
      expect.unreachable('render should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(WatchError);
      expect(err).toMatchObject({ code: 'MESSAGE_INVALID', context: { length: 2001, maxLength: 2000 } });
    }
  });
});

describe('formatCycleResult', () => {
  const base: CycleResult = {
    mode: 'scheduled',
    timestamp: new Date('2026-03-01T09:00:00.000Z'),
    publicIp: '5.6.7.8',
    previousPublicIp: '1.2.3.4',
    ipChanged: true,
    shouldNotify: true,
    notificationSent: true,
    recorded: true,
    durationSeconds: 1.5,
    success: true,
    failures: [],
  };

  it('describes a successful change', () => {
    const lines = formatCycleResult(base).split('\n');

    expect(lines[0]).toBe('## Check Result (scheduled)');
    expect(lines).toContain('Public IP: 5.6.7.8');
    expect(lines).toContain('Local IP: -');
    expect(lines).toContain('Changed: yes (previous: 1.2.3.4)');
    expect(lines).toContain('Notification: sent');
    expect(lines).toContain('Recorded: yes');
    expect(lines).toContain('Duration: 1.50s');
    expect(lines[lines.length - 1]).toBe('Status: OK');
  });

  it('lists failures', () => {
    const text = formatCycleResult({
      ...base,
      notificationSent: false,
      success: false,
      failures: [{ stage: 'delivery', code: 'DELIVERY_REJECTED', message: 'HTTP 404' }],
    });
    const lines = text.split('\n');

    expect(lines).toContain('Notification: not sent');
    expect(lines).toContain('- [delivery] DELIVERY_REJECTED: HTTP 404');
    expect(lines[lines.length - 1]).toBe('Status: FAILED');
  });

  it('omits the recorded line for test cycles', () => {
    const lines = formatCycleResult({ ...base, mode: 'test', shouldNotify: false, recorded: false }).split('\n');

    expect(lines).toContain('Notification: not needed');
    expect(lines.some((line) => line.startsWith('Recorded:'))).toBe(false);
  });
});

describe('formatHistorySummary', () => {
  it('renders an empty history', () => {
    const record = createEmptyHistory(new Date('2026-03-01T09:00:00.000Z'));
    const summary: HistorySummary = {
      metadata: record.metadata,
      current: record.current,
      statistics: record.statistics,
      frequencyPercentage: {},
      recentActivity: [],
      totalEventRecords: 0,
      historyFileSize: '0 B',
    };
    const lines = formatHistorySummary(summary).split('\n');

    expect(lines).toContain('Current public IP: -');
    expect(lines).toContain('- scheduled: 0');
    expect(lines).toContain('No checks recorded.');
    expect(lines[lines.length - 1]).toBe('Events retained: 0, file size: 0 B');
  });

  it('renders statistics and recent events', () => {
    const record = createEmptyHistory(new Date('2026-03-01T09:00:00.000Z'));
    record.current.publicIp = '5.6.7.8';
    record.metadata.totalChecks = 4;
    record.statistics.checkFrequencyByMode = { scheduled: 3, manual: 1, test: 0 };
    const summary: HistorySummary = {
      metadata: record.metadata,
      current: record.current,
      statistics: record.statistics,
      frequencyPercentage: { scheduled: 75, manual: 25, test: 0 },
      recentActivity: [
        {
          timestamp: '2026-03-04T09:00:00.000Z',
          publicIp: '5.6.7.8',
          localIp: null,
          mode: 'manual',
          ipChanged: true,
          notificationSent: true,
          durationSeconds: 0.4,
          previousPublicIp: '1.2.3.4',
        },
      ],
      totalEventRecords: 4,
      historyFileSize: '1.2 KB',
    };
    const lines = formatHistorySummary(summary).split('\n');

    expect(lines).toContain('Current public IP: 5.6.7.8');
    expect(lines).toContain('- Total checks: 4');
    expect(lines).toContain('- scheduled: 3 (75.0%)');
    expect(lines).toContain('- test: 0 (0.0%)');
    expect(lines).toContain('- 2026-03-04T09:00:00.000Z manual 5.6.7.8 (changed, notified)');
  });
});

describe('formatChangeTimeline', () => {
  it('lists changes with their previous address', () => {
    const text = formatChangeTimeline(
      [
        {
          timestamp: '2026-03-04T09:00:00.000Z',
          publicIp: '5.6.7.8',
          localIp: null,
          mode: 'scheduled',
          ipChanged: true,
          notificationSent: true,
          durationSeconds: 0.4,
          previousPublicIp: '1.2.3.4',
        },
        {
          timestamp: '2026-03-01T09:00:00.000Z',
          publicIp: '1.2.3.4',
          localIp: null,
          mode: 'manual',
          ipChanged: true,
          notificationSent: true,
          durationSeconds: 0.2,
        },
      ],
      7
    );

    expect(text).toBe(
      [
        '### IP Changes (last 7 days)',
        '- 2026-03-04T09:00:00.000Z 1.2.3.4 -> 5.6.7.8 (scheduled)',
        '- 2026-03-01T09:00:00.000Z - -> 1.2.3.4 (manual)',
      ].join('\n')
    );
    expect(formatChangeTimeline([], 3)).toBe('### IP Changes (last 3 days)\nNo changes.');
  });
});
