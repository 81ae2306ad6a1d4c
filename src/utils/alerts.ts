import nodemailer, { type Transporter } from 'nodemailer';
import { formatStateStamp, type CycleClock } from './time.js';
import type { StateResolution } from './states.js';
import { describeError } from './errors.js';

export interface AlertMessage {
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  send(message: AlertMessage): Promise<void>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  sender: string;
}

/** Sends every alert from the named sender through an already configured nodemailer transporter. */
export const createMailTransport = (transporter: Transporter, from: { name: string; address: string }): MailTransport => ({
  async send({ to, subject, text }) {
    await transporter.sendMail({ from, to, subject, text });
  },
});

export const createSmtpTransport = ({ host, port, user, password, sender }: SmtpSettings): MailTransport => {
  // Port 465 speaks TLS from the first byte; anything else upgrades with STARTTLS.
  const transporter = nodemailer.createTransport({
    host,
    port,
    secure: port === 465,
    requireTLS: port !== 465,
    auth: { user, pass: password },
  });
  return createMailTransport(transporter, { name: sender, address: user });
};

export const buildSystemName = (systemModel: string, domain: string, subdomain: string): string =>
  [systemModel, domain, subdomain].map((part) => part.toUpperCase()).join(' ');

export const composeStartAlert = (
  resolution: Pick<StateResolution, 'startClass' | 'resolvedStart' | 'searchedUntil'>,
  clock: CycleClock,
  systemName: string,
): { subject: string; text: string } | null => {
  const cycleStamp = formatStateStamp(clock.current);
  const plannedStamp = formatStateStamp(clock.systemStart);
  if (resolution.startClass === 'cold') {
    return {
      subject: `${systemName} failed for ${cycleStamp}`,
      text: `Missing states from ${formatStateStamp(resolution.searchedUntil)} to ${plannedStamp}. Starting model with cold states.`,
    };
  }
  if (resolution.startClass === 'degraded') {
    return {
      subject: `${systemName} warning for ${cycleStamp}`,
      text: `Using states from ${formatStateStamp(resolution.resolvedStart)} instead of ${plannedStamp}.`,
    };
  }
  return null;
};

export interface AlertDelivery {
  recipient: string;
  subject: string;
  delivered: boolean;
  error: string | null;
}

export interface DispatchStartAlertOptions {
  resolution: Pick<StateResolution, 'startClass' | 'resolvedStart' | 'searchedUntil'>;
  clock: CycleClock;
  enabled: boolean;
  recipients: string[];
  systemName: string;
  transport: MailTransport;
}

/** Sends one message per recipient; delivery errors are reported, never thrown. */
export const dispatchStartAlert = async ({
  resolution,
  clock,
  enabled,
  recipients,
  systemName,
  transport,
}: DispatchStartAlertOptions): Promise<AlertDelivery[]> => {
  const message = composeStartAlert(resolution, clock, systemName);
  if (!message || !enabled) {
    return [];
  }

  const deliveries: AlertDelivery[] = [];
  for (const recipient of recipients) {
    try {
      await transport.send({ to: recipient, ...message });
      deliveries.push({ recipient, subject: message.subject, delivered: true, error: null });
      console.log(`[alerts] Sent "${message.subject}" to ${recipient}`);
    } catch (error) {
      const reason = describeError(error);
      deliveries.push({ recipient, subject: message.subject, delivered: false, error: reason });
      console.error(`[alerts] Delivery to ${recipient} failed: ${reason}`);
    }
  }
  return deliveries;
};
