import nodemailer, { Transporter } from "nodemailer";
import { config } from "../config";
import { EmailTemplate, OrderEmailPayload } from "../queue/types";
import { createLogger } from "../utils/logger";

const logger = createLogger("mailer");

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<{ messageId: string }>;
}

export interface MailerOptions {
  smtpUrl?: string;
  from?: string;
}

/** Without an SMTP URL messages are serialized to JSON and only logged. */
export function createMailer({
  smtpUrl = config.SMTP_URL,
  from = config.MAIL_FROM,
}: MailerOptions = {}): Mailer {
  const transporter: Transporter = smtpUrl
    ? nodemailer.createTransport(smtpUrl)
    : nodemailer.createTransport({ jsonTransport: true });

  return {
    async send(message) {
      const info = await transporter.sendMail({ from, ...message });
      logger.info({ to: message.to, messageId: info.messageId }, message.subject);
      return { messageId: info.messageId };
    },
  };
}

type EmailContext = OrderEmailPayload["context"];

const templates: Record<EmailTemplate, (context: EmailContext) => Omit<MailMessage, "to">> = {
  "order-confirmed": (context) => ({
    subject: `Order #${context.orderId} confirmed`,
    text: [
      `Hello, ${context.username}!`,
      "",
      `Your order #${context.orderId} has been confirmed.`,
      ...context.items.map(
        (item) => `- ${item.name} x ${item.quantity} @ ${item.price.toFixed(2)}`
      ),
      `Total: ${context.total.toFixed(2)}`,
    ].join("\n"),
  }),
  "order-status": (context) => ({
    subject: `Order #${context.orderId} is now ${context.status}`,
    text: [
      `Hello, ${context.username}!`,
      "",
      `The status of your order #${context.orderId} changed to "${context.status}".`,
    ].join("\n"),
  }),
};

export function renderEmail({ to, template, context }: OrderEmailPayload): MailMessage {
  return { to, ...templates[template](context) };
}
