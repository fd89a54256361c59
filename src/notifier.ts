import nodemailer, { type Transporter } from "nodemailer";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { SmtpSettings } from "./types.js";

export interface Notifier {
  send(subject: string, body: string): Promise<boolean>;
}

export class EmailNotifier implements Notifier {
  private transport?: Transporter;

  constructor(private readonly settings: SmtpSettings, transport?: Transporter) {
    this.transport = transport;
  }

  async send(subject: string, body: string): Promise<boolean> {
    const { from, password, to } = this.settings;
    if (!from || !password || !to) {
      logger.error("Email credentials not set; skipping email", {
        from: Boolean(from),
        password: Boolean(password),
        to: Boolean(to),
      });
      return false;
    }
    try {
      const info = await this.getTransport(from, password).sendMail({
        from,
        to,
        subject,
        text: body,
      });
      logger.info("Email sent", { messageId: info.messageId, to });
      return true;
    } catch (error) {
      logger.error("Failed to send email", {
        host: this.settings.host,
        to,
        error: describeError(error),
      });
      return false;
    }
  }

  private getTransport(user: string, pass: string): Transporter {
    if (!this.transport) {
      this.transport = nodemailer.createTransport({
        host: this.settings.host,
        port: this.settings.port,
        secure: this.settings.port === 465,
        requireTLS: this.settings.port !== 465,
        auth: { user, pass },
      });
    }
    return this.transport;
  }
}
