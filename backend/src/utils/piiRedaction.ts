/**
 * PII Redaction Utility
 * Masks identifying details in free-text symptom descriptions before they are logged
 */

// Patterns for detecting PII. Order matters: longer numeric formats first.
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /(\+?\d{1,2}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g,
  // Date of birth patterns (MM/DD/YYYY, DD-MM-YYYY, etc.)
  dob: /\b\d{1,2}[/-]\d{1,2}[/-](19|20)\d{2}\b/g,
  // UK postcodes and US zip codes
  postcode: /\b([A-Z]{1,2}\d[A-Z\d]?\s?\d[A-Z]{2}|\d{5}(-\d{4})?)\b/gi,
};

type PiiType = keyof typeof PII_PATTERNS;

const PII_TYPES: PiiType[] = ['email', 'phone', 'dob', 'postcode'];

const REDACTION_TOKENS: Record<PiiType, string> = {
  email: '[EMAIL_REDACTED]',
  phone: '[PHONE_REDACTED]',
  dob: '[DOB_REDACTED]',
  postcode: '[POSTCODE_REDACTED]',
};

export interface RedactionResult {
  redactedText: string;
  redactedTypes: PiiType[];
}

export function redactPII(text: string): RedactionResult {
  if (!text) {
    return { redactedText: '', redactedTypes: [] };
  }

  let redactedText = text;
  const redactedTypes: PiiType[] = [];

  for (const piiType of PII_TYPES) {
    const next = redactedText.replace(PII_PATTERNS[piiType], REDACTION_TOKENS[piiType]);
    if (next !== redactedText) {
      redactedTypes.push(piiType);
      redactedText = next;
    }
  }

  return { redactedText, redactedTypes };
}

/**
 * Redacted, truncated form of user text that is safe to put in a log line
 */
export function logPreview(text: string, maxLength = 80): string {
  const { redactedText } = redactPII(text);
  const singleLine = redactedText.replace(/\s+/g, ' ').trim();
  return singleLine.length > maxLength ? `${singleLine.slice(0, maxLength)}…` : singleLine;
}
