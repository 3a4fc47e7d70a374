import "dotenv/config";

export type PriceSourceName = "binance" | "yahoo";

function priceSourceName(raw: string | undefined): PriceSourceName {
  return raw?.toLowerCase() === "yahoo" ? "yahoo" : "binance";
}

/** Falls back when the value is missing, non-numeric or not above zero. */
export function positiveNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isFinite(value) && value > 0 ? value : fallback;
}

const port = positiveNumber(process.env.PORT, 3000);

export const config = {
  port,
  priceSource: priceSourceName(process.env.PRICE_SOURCE),
  binance: {
    spotUrl: process.env.BINANCE_SPOT_URL || "https://api.binance.com",
    futuresUrl: process.env.BINANCE_FUTURES_URL || "https://fapi.binance.com",
  },
  lookupTimeoutMs: positiveNumber(process.env.LOOKUP_TIMEOUT_MS, 10_000),
  checkIntervalSeconds: positiveNumber(process.env.CHECK_INTERVAL_SECONDS, 300),
  errorCooldownSeconds: positiveNumber(process.env.ERROR_COOLDOWN_SECONDS, 60),
  telegramBotToken: process.env.TELEGRAM_BOT_TOKEN,
  smtp: {
    host: process.env.SMTP_HOST,
    port: positiveNumber(process.env.SMTP_PORT, 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
  },
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID,
    authToken: process.env.TWILIO_AUTH_TOKEN,
    fromNumber: process.env.TWILIO_FROM_NUMBER,
  },
  notifyEmail: process.env.NOTIFY_EMAIL,
  notifySms: process.env.NOTIFY_SMS,
  serverUrl: process.env.ALERTS_SERVER_URL || `http://localhost:${port}`,
};

export type Config = typeof config;

export function isTelegramConfigured(): boolean {
  return !!config.telegramBotToken;
}

export function isEmailConfigured(): boolean {
  return !!(config.smtp.host && config.smtp.user && config.smtp.pass && config.notifyEmail);
}

export function isSmsConfigured(): boolean {
  return !!(config.twilio.accountSid && config.twilio.authToken && config.twilio.fromNumber && config.notifySms);
}
