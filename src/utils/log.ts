const SENSITIVE_KEY_TERMS = ['email', 'phone', 'token', 'secret', 'key', 'patient', 'occupant'];

function maskSensitiveValue(value: string): string {
  let redacted = value;
  redacted = redacted.replace(
    /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g,
    (_match, user: string, domain: string) => `${user.slice(0, 1)}***@${domain}`,
  );
  redacted = redacted.replace(/\+\d[\d\s-]{6,}\d\b|\b\d{3}[\s.-]?\d{3}[\s.-]\d{4}\b/g, '[redacted-phone]');
  redacted = redacted.replace(/(sk|pk|rk|api|secret)[-_][a-z0-9]{8,}/gi, '[redacted-secret]');
  return redacted;
}

/**
 * Mask contact details and keyed identifiers in a payload before it is written
 * to the console. Values under sensitive keys are replaced outright; other
 * strings are scanned for e-mail addresses, phone numbers and API keys. Names
 * inside free text are not detected, so log identifiers rather than result
 * messages.
 */
export function redactForLog(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return payload;
  }
  if (typeof payload === 'string') {
    return maskSensitiveValue(payload);
  }
  if (Array.isArray(payload)) {
    return payload.map(redactForLog);
  }
  if (typeof payload === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      const keyLower = key.toLowerCase();
      const isSensitiveKey = SENSITIVE_KEY_TERMS.some((term) => keyLower.includes(term));
      if (typeof value === 'string' && isSensitiveKey) {
        result[key] = `[redacted-${key}]`;
      } else {
        result[key] = redactForLog(value);
      }
    }
    return result;
  }
  return payload;
}

export function logEvent(event: string, payload?: unknown): void {
  const stamp = `[${new Date().toISOString()}] ${event}`;
  if (payload === undefined) {
    console.log(stamp);
    return;
  }
  console.log(stamp, JSON.stringify(redactForLog(payload)));
}

export function logError(event: string, error: unknown): void {
  console.error(`[${new Date().toISOString()}] ${event}`, error);
}
