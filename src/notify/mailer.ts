import nodemailer, { type Transporter } from "nodemailer";
import type { NotificationConfig } from "../config.js";

export type AlertMessage = {
  subject: string;
  text: string;
};

export type Notifier = {
  send(message: AlertMessage): Promise<void>;
};

type SmtpSettings = NotificationConfig & { password: string };

export class SmtpNotifier implements Notifier {
  private readonly transporter: Transporter;

  constructor(private readonly settings: SmtpSettings) {
    this.transporter = nodemailer.createTransport({
      host: settings.host,
      port: settings.port,
      secure: settings.secure,
      auth: {
        user: settings.username ?? settings.from,
        pass: settings.password
      }
    });
  }

  async send(message: AlertMessage) {
    await this.transporter.sendMail({
      from: this.settings.from,
      to: this.settings.to.join(", "),
      subject: message.subject,
      text: message.text
    });
  }
}

/** Null when notification is off; the SMTP password only ever comes from the environment. */
export function createNotifier(config: NotificationConfig, password: string | undefined): Notifier | null {
  if (!config.enabled || !password) return null;
  return new SmtpNotifier({ ...config, password });
}
