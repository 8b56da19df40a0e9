import axios, { type AxiosRequestConfig } from "axios";
import type { TwilioSettings } from "../config/env";
import { ConfigurationError, NotificationError, NotificationRateLimitedError, describeError } from "../errors";
import { createLogger } from "../logger";
import { httpStatusOf, isRecord, readString } from "../utils";

const log = createLogger("twilio");

const TWILIO_API_BASE = "https://api.twilio.com/2010-04-01";
const SEND_TIMEOUT_MS = 30_000;

export type FormPoster = (url: string, body: URLSearchParams, config: AxiosRequestConfig) => Promise<{ data: unknown }>;

export interface Notifier {
  /** Resolves to the provider message id. */
  send(body: string): Promise<string>;
}

interface BasicAuth {
  username: string;
  password: string;
}

export function resolveCredentials(settings: TwilioSettings): { accountSid: string; auth: BasicAuth } {
  const { accountSid, authToken, apiKeySid, apiKeySecret } = settings;
  if (accountSid && apiKeySid && apiKeySecret) {
    return { accountSid, auth: { username: apiKeySid, password: apiKeySecret } };
  }
  if (accountSid && authToken) {
    return { accountSid, auth: { username: accountSid, password: authToken } };
  }
  throw new ConfigurationError(
    "Twilio creds missing. Set (TWILIO_API_KEY_SID, TWILIO_API_KEY_SECRET, TWILIO_ACCOUNT_SID) or (TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN)."
  );
}

export function toWhatsAppAddress(number: string): string {
  const trimmed = number.trim();
  return trimmed.startsWith("whatsapp:") ? trimmed : `whatsapp:${trimmed}`;
}

export class TwilioWhatsAppNotifier implements Notifier {
  private readonly post: FormPoster;

  constructor(
    private readonly settings: TwilioSettings,
    post?: FormPoster
  ) {
    this.post = post ?? ((url, body, config) => axios.post<unknown>(url, body, config));
  }

  async send(body: string): Promise<string> {
    const { from, to } = this.settings;
    if (!from || !to) {
      throw new ConfigurationError("Missing WhatsApp numbers. Set TWILIO_WHATSAPP_FROM and WHATSAPP_TO.");
    }
    const { accountSid, auth } = resolveCredentials(this.settings);
    const url = `${TWILIO_API_BASE}/Accounts/${encodeURIComponent(accountSid)}/Messages.json`;

    let data: unknown;
    try {
      const response = await this.post(
        url,
        new URLSearchParams({ From: toWhatsAppAddress(from), To: toWhatsAppAddress(to), Body: body }),
        {
          auth,
          timeout: SEND_TIMEOUT_MS,
          headers: { "Content-Type": "application/x-www-form-urlencoded" }
        }
      );
      data = response.data;
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 429) {
        throw new NotificationRateLimitedError();
      }
      log.error(`Twilio error (${status ?? "n/a"}): ${describeError(error)}`);
      throw new NotificationError(`WhatsApp delivery failed: ${describeError(error)}`, status, error);
    }

    const sid = isRecord(data) ? readString(data, "sid") : "";
    if (!sid) {
      throw new NotificationError("Twilio response did not include a message sid", null);
    }
    return sid;
  }
}
