import nodemailer from 'nodemailer'
import type {
  LeadStatusChangeNotification,
  MailConfig,
  MailTransport,
  NewClientNotification,
  NewLeadNotification,
  Notifier,
} from './types.js'
import { leadStatusChangeMail, newClientMail, newLeadMail, type RenderedMail } from './templates.js'
import { debug, error as logError, info } from '../logger.js'

/**
 * `ssl` connects over TLS; `tls` upgrades with STARTTLS when the server offers it; `none`
 * never upgrades.
 */
export function createMailTransport(config: MailConfig): MailTransport {
  const auth =
    config.username && config.password ? { user: config.username, pass: config.password } : undefined

  const transporter = nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.encryption === 'ssl',
    ignoreTLS: config.encryption === 'none',
    auth,
  })

  return {
    sendMail: (message) => transporter.sendMail(message),
  }
}

/**
 * Email notifications to the administrator address.
 *
 * Sending is best-effort: a disabled or unconfigured mailer returns false without touching
 * the transport, and transport failures are logged and reported as false.
 */
export class EmailNotifier implements Notifier {
  private transport: MailTransport | null

  constructor(
    private readonly config: MailConfig,
    transport?: MailTransport
  ) {
    this.transport = transport ?? null
  }

  isEnabled(): boolean {
    return this.config.enabled && Boolean(this.config.host)
  }

  notifyNewClient(event: NewClientNotification): Promise<boolean> {
    return this.send('NewClient', newClientMail(event))
  }

  notifyNewLead(event: NewLeadNotification): Promise<boolean> {
    return this.send('NewLead', newLeadMail(event))
  }

  notifyLeadStatusChange(event: LeadStatusChangeNotification): Promise<boolean> {
    return this.send('LeadStatusChange', leadStatusChangeMail(event))
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      this.transport = createMailTransport(this.config)
    }
    return this.transport
  }

  private async send(kind: string, mail: RenderedMail): Promise<boolean> {
    if (!this.isEnabled()) {
      debug('Email notifications disabled, skipping send', {
        event: 'NotificationSkipped',
        metadata: { kind, subject: mail.subject },
      })
      return false
    }

    try {
      await this.getTransport().sendMail({
        from: `"${this.config.fromName}" <${this.config.fromAddress}>`,
        to: this.config.adminEmail,
        subject: mail.subject,
        text: mail.text,
        html: mail.html,
      })

      info('Notification sent', { event: 'NotificationSent', metadata: { kind, subject: mail.subject } })
      return true
    } catch (err) {
      logError('Failed to send notification', {
        event: 'NotificationSendError',
        metadata: { kind, subject: mail.subject, error: err },
      })
      return false
    }
  }
}
