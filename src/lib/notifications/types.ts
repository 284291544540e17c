import type { Env } from '../../config/env.js'

export type MailEncryption = 'ssl' | 'tls' | 'none'

/**
 * SMTP settings for notification mail. Built from the environment by getMailConfig().
 */
export interface MailConfig {
  enabled: boolean
  host?: string
  port: number
  username?: string
  password?: string
  fromAddress: string
  fromName: string
  encryption: MailEncryption
  adminEmail: string
}

export interface MailMessage {
  from: string
  to: string
  subject: string
  text: string
  html: string
}

/**
 * The part of a nodemailer Transporter the dispatcher uses.
 */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>
}

export interface NewClientNotification {
  clientId: number
  clientName: string
  phone: string | null
}

export interface NewLeadNotification {
  leadId: number
  clientName: string
  channel: string
}

export interface LeadStatusChangeNotification {
  leadId: number
  clientName: string
  oldStatus: string
  newStatus: string
}

/**
 * Post-commit notifications. Every method resolves to whether a message was sent and never
 * rejects.
 */
export interface Notifier {
  notifyNewClient(event: NewClientNotification): Promise<boolean>
  notifyNewLead(event: NewLeadNotification): Promise<boolean>
  notifyLeadStatusChange(event: LeadStatusChangeNotification): Promise<boolean>
}

export function getMailConfig(env: Env): MailConfig {
  return {
    enabled: env.ENABLE_EMAIL_NOTIFICATIONS,
    host: env.MAIL_HOST,
    port: env.MAIL_PORT,
    username: env.MAIL_USERNAME,
    password: env.MAIL_PASSWORD,
    fromAddress: env.MAIL_FROM_ADDRESS,
    fromName: env.MAIL_FROM_NAME,
    encryption: env.MAIL_ENCRYPTION,
    adminEmail: env.ADMIN_EMAIL,
  }
}
