import type {
  LeadStatusChangeNotification,
  NewClientNotification,
  NewLeadNotification,
} from './types.js'

export interface RenderedMail {
  subject: string
  text: string
  html: string
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;')
}

type Field = [label: string, value: string | number]

function renderHtml(title: string, intro: string, fields: Field[]): string {
  const items = fields
    .map(([label, value]) => `      <li><strong>${escapeHtml(label)}:</strong> ${escapeHtml(String(value))}</li>`)
    .join('\n')

  return `<!DOCTYPE html>
<html>
<body style="font-family: Arial, sans-serif;">
    <h2>${escapeHtml(title)}</h2>
    <p>${intro}</p>
    <ul>
${items}
    </ul>
</body>
</html>`
}

function renderText(title: string, intro: string, fields: Field[]): string {
  const lines = fields.map(([label, value]) => `- ${label}: ${value}`)
  return [title, '', intro, ...lines].join('\n')
}

export function newClientMail(event: NewClientNotification): RenderedMail {
  const title = 'Nuevo Cliente Registrado'
  const intro = 'Se ha registrado un nuevo cliente:'
  const fields: Field[] = [
    ['ID', event.clientId],
    ['Nombre', event.clientName],
    ['Teléfono', event.phone ?? '-'],
  ]

  return {
    subject: `Nuevo Cliente - ${event.clientName}`,
    text: renderText(title, intro, fields),
    html: renderHtml(title, intro, fields),
  }
}

export function newLeadMail(event: NewLeadNotification): RenderedMail {
  const title = 'Nuevo Lead Registrado'
  const intro = 'Se ha registrado un nuevo lead en el sistema:'
  const fields: Field[] = [
    ['ID', event.leadId],
    ['Cliente', event.clientName],
    ['Canal', event.channel],
  ]

  return {
    subject: `Nuevo Lead #${event.leadId} - ${event.clientName}`,
    text: `${renderText(title, intro, fields)}\n\nPor favor, revise el sistema para más detalles.`,
    html: renderHtml(title, intro, fields),
  }
}

export function leadStatusChangeMail(event: LeadStatusChangeNotification): RenderedMail {
  const title = 'Cambio de Estado de Lead'
  const intro = `El lead #${event.leadId} ha cambiado de estado:`
  const fields: Field[] = [
    ['Cliente', event.clientName],
    ['Estado Anterior', event.oldStatus],
    ['Estado Nuevo', event.newStatus],
  ]

  return {
    subject: `Lead #${event.leadId} - Cambio de Estado`,
    text: renderText(title, intro, fields),
    html: renderHtml(title, intro, fields),
  }
}
