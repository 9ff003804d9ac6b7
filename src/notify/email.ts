import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { logger } from "../logger.ts";

export interface OutgoingMessage {
  to: string;
  subject: string;
  html: string;
}

export type DeliveryResult = { ok: true; messageId: string } | { ok: false; error: string };

/** Delivers one rendered message. Implementations resolve with a failure instead of rejecting. */
export interface NotificationSender {
  send(message: OutgoingMessage): Promise<DeliveryResult>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user?: string;
  password?: string;
  senderEmail?: string;
  senderName: string;
}

export function createSmtpSender(settings: SmtpSettings): NotificationSender {
  let transporter: Transporter | null = null;

  return {
    async send(message) {
      const senderEmail = settings.senderEmail ?? settings.user;
      if (!senderEmail) {
        logger.error("No sender email configured", { to: message.to });
        return { ok: false, error: "No sender email configured" };
      }
      if (!settings.user || !settings.password) {
        logger.error("SMTP credentials missing", { to: message.to });
        return { ok: false, error: "Missing SMTP user or password" };
      }

      transporter ??= nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.port === 465,
        auth: { user: settings.user, pass: settings.password },
      });

      try {
        const info = await transporter.sendMail({
          from: `"${settings.senderName}" <${senderEmail}>`,
          to: message.to,
          subject: message.subject,
          html: message.html,
        });
        logger.info("Email sent", { to: message.to, message_id: info.messageId });
        return { ok: true, messageId: info.messageId };
      } catch (err) {
        const error = `SMTP error: ${err instanceof Error ? err.message : String(err)}`;
        logger.error("Email send failed", { to: message.to, error });
        return { ok: false, error };
      }
    },
  };
}
