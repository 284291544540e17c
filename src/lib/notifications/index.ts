/**
 * Notification Dispatcher
 *
 * Entity services call the process-wide notifier after their transaction commits.
 */

import { getEnv } from '../../config/env.js'
import { EmailNotifier } from './email-notifier.js'
import { getMailConfig, type Notifier } from './types.js'

export type {
  MailConfig,
  MailEncryption,
  MailMessage,
  MailTransport,
  Notifier,
  NewClientNotification,
  NewLeadNotification,
  LeadStatusChangeNotification,
} from './types.js'
export { getMailConfig } from './types.js'
export { EmailNotifier, createMailTransport } from './email-notifier.js'
export { escapeHtml } from './templates.js'

let notifier: Notifier | null = null

export function getNotifier(): Notifier {
  if (!notifier) {
    notifier = new EmailNotifier(getMailConfig(getEnv()))
  }
  return notifier
}

/**
 * Replace the process-wide notifier (tests install a fake).
 */
export function setNotifier(instance: Notifier | null): void {
  notifier = instance
}
