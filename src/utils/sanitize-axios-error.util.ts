import axios from "axios";

const SENSITIVE_KEYS = [
  "BOT_API_KEY",
  "POLY_API_KEY",
  "POLY_API_SECRET",
  "POLY_API_PASSPHRASE",
  "POLY_PRIVATE_KEY",
  "POLY_SIGNATURE",
  "CONTROL_TOKEN",
  "X-Control-Token",
  "Authorization",
  "Cookie",
  "private_key",
  "privateKey",
  "secret",
  "passphrase",
];

export function redactSensitiveValues(value: string): string {
  let redacted = value.replace(/Bearer\s+[^\s"',;]+/gi, "Bearer <redacted>");
  for (const key of SENSITIVE_KEYS) {
    const jsonRegex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, "gi");
    redacted = redacted.replace(jsonRegex, '$1"<redacted>"');
    const keyRegex = new RegExp(
      `(^|[^"\\w])(${key})\\s*[:=]\\s*(["']?)[^\\s"',;]+\\3`,
      "gi",
    );
    redacted = redacted.replace(keyRegex, "$1$2=<redacted>");
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
    // path only: query strings may carry tokens
    compact.url = error.config.url.split("?")[0];
  }
  if (error.code) {
    compact.errorCode = error.code;
  }

  const responseData: unknown = error.response?.data;
  if (typeof responseData === "string" && responseData.length > 0) {
    compact.errorMessage = redactSensitiveValues(responseData.slice(0, 200));
  } else if (responseData && typeof responseData === "object") {
    const errorText =
      ("error" in responseData ? responseData.error : undefined) ??
      ("message" in responseData ? responseData.message : undefined);
    if (errorText) {
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

export function sanitizeErrorMessage(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return formatCompactError(extractCompactAxiosError(error));
  }
  if (error instanceof Error) {
    return redactSensitiveValues(error.message);
  }
  return redactSensitiveValues(String(error));
}
