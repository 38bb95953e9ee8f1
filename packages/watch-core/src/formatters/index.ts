export {
  NotificationFormatter,
  findUnknownPlaceholders,
  DEFAULT_MESSAGE_TEMPLATE,
  DISCORD_MAX_MESSAGE_LENGTH,
  TEMPLATE_PLACEHOLDERS,
} from './notification-formatter.js';
export type {
  NotificationFormatterOptions,
  TemplatePlaceholder,
} from './notification-formatter.js';
export { formatCycleResult, formatHistorySummary, formatChangeTimeline } from './status-formatter.js';
