import axios from "axios";

const SENSITIVE_KEYS = [
  "POLY_API_KEY",
  "POLY_SECRET",
  "POLY_PASSPHRASE",
  "POLY_SIGNATURE",
  "POLYMARKET_API_KEY",
  "POLYMARKET_API_SECRET",
  "POLYMARKET_API_PASSPHRASE",
  "PRIVATE_KEY",
  "X-API-KEY",
  "Authorization",
  "Cookie",
  "private_key",
  "privateKey",
  "secret",
  "passphrase",
];

export function redactSensitiveValues(value: string): string {
  let redacted = value;
  for (const key of SENSITIVE_KEYS) {
    const keyRegex = new RegExp(
      `(${key})\\s*[:=]\\s*(["']?)[^\\s"',;]+\\2`,
      "gi",
    );
    redacted = redacted.replace(keyRegex, "$1=<redacted>");
    const jsonRegex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, "gi");
    redacted = redacted.replace(jsonRegex, '$1"<redacted>"');
  }
  return redacted;
}

/**
 * Compact structured representation of an Axios error
 */
export interface CompactAxiosError {
  status?: number;
  method?: string;
  url?: string;
  errorMessage?: string;
  errorCode?: string;
}

/**
 * Extract a compact error summary from an Axios error without the request
 * config, headers or query string.
 */
export function extractCompactAxiosError(error: unknown): CompactAxiosError {
  if (!axios.isAxiosError(error)) {
    return {
      errorMessage: redactSensitiveValues(
        error instanceof Error ? error.message : String(error),
      ),
    };
  }

  const compact: CompactAxiosError = {};

  if (error.response?.status) {
    compact.status = error.response.status;
  }
  if (error.config?.method) {
    compact.method = error.config.method.toUpperCase();
  }
  if (error.config?.url) {
    compact.url = error.config.url.split("?")[0];
  }
  if (error.code) {
    compact.errorCode = error.code;
  }

  const responseData: unknown = error.response?.data;
  if (typeof responseData === "string" && responseData) {
    compact.errorMessage = redactSensitiveValues(responseData.slice(0, 200));
  } else if (responseData && typeof responseData === "object") {
    const errorText: unknown =
      Reflect.get(responseData, "error") ??
      Reflect.get(responseData, "msg") ??
      Reflect.get(responseData, "message");
    if (errorText !== undefined) {
      compact.errorMessage = redactSensitiveValues(
        String(errorText).slice(0, 200),
      );
    }
  }

  if (!compact.errorMessage && error.message) {
    compact.errorMessage = redactSensitiveValues(error.message.slice(0, 200));
  }

  return compact;
}

export function formatCompactError(compact: CompactAxiosError): string {
  const parts: string[] = [];

  if (compact.status) {
    parts.push(`status=${compact.status}`);
  }
  if (compact.method) {
    parts.push(`method=${compact.method}`);
  }
  if (compact.url) {
    parts.push(`url=${compact.url}`);
  }
  if (compact.errorCode) {
    parts.push(`code=${compact.errorCode}`);
  }
  if (compact.errorMessage) {
    parts.push(`error="${compact.errorMessage}"`);
  }

  return parts.join(" ");
}

/**
 * One-line, secret-free description of any thrown value. Axios errors are
 * compacted; anything else keeps its message with secrets redacted.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return formatCompactError(extractCompactAxiosError(error));
  }
  const message = error instanceof Error ? error.message : String(error);
  return redactSensitiveValues(message);
}
