import { Logger } from "keyward-core";

export type AccountEmailKind = "confirm_new_user" | "password_reset" | "magic_link";

export interface AccountEmail {
  kind: AccountEmailKind;
  to: string;
  subject: string;
  html: string;
  /** The link the recipient follows; carries the token */
  url: string;
}

export interface Sender {
  send(message: AccountEmail): Promise<void>;
}

const EMAIL_COPY: Record<
  AccountEmailKind,
  { subject: string; path: string; lead: string }
> = {
  confirm_new_user: {
    subject: "Confirm your email address",
    path: "/auth/confirm",
    lead: "Click this link to confirm your email:",
  },
  password_reset: {
    subject: "Reset your password",
    path: "/auth/password-reset",
    lead: "Click this link to reset your password:",
  },
  magic_link: {
    subject: "Your sign-in link",
    path: "/auth/magic-link/sign-in",
    lead: "Click this link to sign in:",
  },
};

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

export function buildAccountEmail(
  kind: AccountEmailKind,
  to: string,
  token: string,
  appBaseUrl: string,
): AccountEmail {
  const copy = EMAIL_COPY[kind];
  const url = new URL(copy.path, appBaseUrl);
  url.searchParams.set("token", token);
  const href = escapeHtml(url.toString());

  return {
    kind,
    to,
    subject: copy.subject,
    url: url.toString(),
    html: `<p>${copy.lead}</p>\n<p><a href="${href}">${href}</a></p>`,
  };
}

/**
 * Writes account emails to the log instead of delivering them. There is no
 * mail transport in this service; a deployment that needs one plugs another
 * Sender in.
 */
export class LoggingSender implements Sender {
  constructor(private readonly logger: Logger) {}

  async send(message: AccountEmail): Promise<void> {
    // The body and url carry a single-use token and stay out of the log
    this.logger.info(`Email would be sent to ${message.to}: ${message.subject}`, {
      type: "account_email",
      kind: message.kind,
    });
  }
}
