import nodemailer from 'nodemailer'
import { describeError } from './errors'
import type { NotificationKind } from './types'

export type MailMessage = {
  from: string
  to: string
  subject: string
  text: string
}

export type SendMail = (message: MailMessage) => Promise<unknown>

export interface Notifier {
  notify(kind: NotificationKind, description: string): Promise<boolean>
}

export type SmtpOptions = {
  host: string
  port: number
  user: string
  password: string
}

export const createSmtpSendMail = ({ host, port, user, password }: SmtpOptions): SendMail => {
  const transporter = nodemailer.createTransport({
    host,
    port,
    secure: port === 465,
    requireTLS: port === 587,
    auth: { user, pass: password },
  })
  return (message) => transporter.sendMail(message)
}

const composeMessage = (kind: NotificationKind, description: string) => {
  if (kind === 'delivered') {
    return {
      subject: 'Package Delivered',
      text: `A package delivery was detected at the front door.\n\n${description}`,
    }
  }
  return {
    subject: 'ALERT: Possible Package Thief Detected',
    text:
      'Suspicious activity was detected at the front door.\n\n' +
      `${description}\n\n` +
      'Check the camera app or Google Drive for the flagged image.',
  }
}

type EmailNotifierOptions = {
  sender: string
  recipients: string[]
  sendMail: SendMail
}

/** Sends one plain-text e-mail per notification. Failures are logged, not thrown. */
export const createEmailNotifier = ({
  sender,
  recipients,
  sendMail,
}: EmailNotifierOptions): Notifier => ({
  notify: async (kind, description) => {
    const { subject, text } = composeMessage(kind, description)
    try {
      await sendMail({ from: sender, to: recipients.join(', '), subject, text })
      console.log('[Notifier] Email sent to', recipients)
      return true
    } catch (error) {
      console.error('[Notifier] Failed to send email:', describeError(error))
      return false
    }
  },
})
