/**
 * Administrator notifications.
 * Delivery is best effort: a failed send is reported on the event bus and
 * never reaches the security decision that triggered it.
 */

import nodemailer from "nodemailer";
import { EventBus } from "../eventBus";
import { toError } from "../errors";

export interface Notifier {
  send(to: string, subject: string, body: string): Promise<void>;
}

export interface SmtpConfig {
  host: string;
  port: number;
  user?: string;
  password?: string;
  from: string;
}

export class MailNotifier implements Notifier {
  private transporter: nodemailer.Transporter;
  private from: string;

  constructor(config: SmtpConfig) {
    this.from = config.from;
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.port === 465,
      auth: config.user ? { user: config.user, pass: config.password } : undefined,
    });
  }

  async send(to: string, subject: string, body: string): Promise<void> {
    await this.transporter.sendMail({ from: this.from, to, subject, text: body });
  }
}

export class NullNotifier implements Notifier {
  async send(): Promise<void> {
    // nothing configured
  }
}

export interface AdminNotifierConfig {
  adminEmail?: string;
  siteName: string;
}

export class AdminNotifier {
  constructor(
    private readonly notifier: Notifier,
    private readonly config: AdminNotifierConfig,
    private readonly eventBus: EventBus
  ) {}

  get siteName(): string {
    return this.config.siteName;
  }

  /**
   * Fire and forget. Returns immediately; failures surface as NotificationFailedEvent.
   */
  notify(subject: string, body: string): void {
    const to = this.config.adminEmail;
    if (!to) return;
    let pending: Promise<void>;
    try {
      pending = this.notifier.send(to, `[${this.config.siteName}] ${subject}`, body);
    } catch (error: unknown) {
      this.reportFailure(subject, error);
      return;
    }
    pending.catch((error: unknown) => this.reportFailure(subject, error));
  }

  private reportFailure(subject: string, error: unknown): void {
    this.eventBus.emit("NotificationFailedEvent", { subject, error: toError(error).message });
  }
}
