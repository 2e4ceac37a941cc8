import sanitizeHtml from 'sanitize-html';

export interface SanitizationOptions {
  allowedTags?: string[];
  allowedAttributes?: Record<string, string[]>;
  allowedSchemes?: string[];
}

const DEFAULT_OPTIONS: SanitizationOptions = {
  allowedTags: [],
  allowedAttributes: {},
  allowedSchemes: ['http', 'https', 'mailto'],
};

const RELAXED_OPTIONS: SanitizationOptions = {
  allowedTags: ['b', 'i', 'em', 'strong', 'br', 'p'],
  allowedAttributes: {},
  allowedSchemes: ['http', 'https', 'mailto'],
};

// Blog bodies are authored by staff and rendered as HTML
const RICH_TEXT_OPTIONS: SanitizationOptions = {
  allowedTags: ['b', 'i', 'em', 'strong', 'br', 'p', 'h2', 'h3', 'h4', 'ul', 'ol', 'li', 'blockquote', 'a'],
  allowedAttributes: { a: ['href', 'title'] },
  allowedSchemes: ['http', 'https', 'mailto'],
};

export function sanitizeString(input: string | null | undefined, options: SanitizationOptions = DEFAULT_OPTIONS): string {
  if (!input) return '';

  const sanitizeOptions = {
    allowedTags: options.allowedTags || [],
    allowedAttributes: options.allowedAttributes || {},
    allowedSchemes: options.allowedSchemes || ['http', 'https', 'mailto'],
    disallowedTagsMode: 'discard' as const,
    selfClosing: ['br'],
    allowedSchemesByTag: {},
    allowProtocolRelative: false
  };

  let sanitized = sanitizeHtml(input.trim(), sanitizeOptions);

  sanitized = sanitized
    .replace(/on\w+\s*=\s*["'][^"']*["']/gi, '')
    .replace(/javascript:/gi, '')
    .replace(/data:/gi, '');

  return sanitized.trim();
}

const TEXT_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

// Plain-text fields are stored unescaped; only HTML fields keep entities.
export function sanitizeText(input: string | null | undefined): string {
  return sanitizeString(input, DEFAULT_OPTIONS)
    .replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => TEXT_ENTITIES[entity] ?? entity);
}

export function sanitizeEmail(email: string | null | undefined): string {
  if (!email) return '';

  const sanitized = sanitizeText(email)
    .toLowerCase()
    .replace(/[^a-z0-9@._+-]/g, '')
    .trim();

  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  if (!emailRegex.test(sanitized)) {
    return '';
  }

  return sanitized;
}

export function sanitizePhone(phone: string | null | undefined): string {
  if (!phone) return '';

  let sanitized = sanitizeText(phone)
    .replace(/[^\d+\-() ]/g, '')
    .trim();

  if (sanitized.length > 20) {
    sanitized = sanitized.substring(0, 20);
  }

  return sanitized;
}

export function sanitizeMessage(message: string | null | undefined): string {
  if (!message) return '';

  let sanitized = sanitizeString(message, RELAXED_OPTIONS);

  if (sanitized.length > 5000) {
    sanitized = sanitized.substring(0, 5000);
  }

  return sanitized;
}

export function sanitizeAddress(address: string | null | undefined): string {
  if (!address) return '';

  let sanitized = sanitizeText(address);

  if (sanitized.length > 500) {
    sanitized = sanitized.substring(0, 500);
  }

  return sanitized;
}

export function sanitizeRichText(body: string | null | undefined): string {
  return sanitizeString(body, RICH_TEXT_OPTIONS);
}

export function sanitizeUrl(url: string | null | undefined): string {
  if (!url) return '';

  const sanitized = sanitizeText(url);

  if (!/^https?:\/\//i.test(sanitized)) {
    return '';
  }

  try {
    const parsedUrl = new URL(sanitized);
    if (!['http:', 'https:'].includes(parsedUrl.protocol)) {
      return '';
    }
    return parsedUrl.toString();
  } catch {
    return '';
  }
}

export type Sanitizer = (input: string) => string;
export type FieldSanitizers = Record<string, Sanitizer>;

/**
 * Cleans the named string fields of a request body before it is validated,
 * so a value that sanitises down to nothing fails its schema. Fields that
 * are absent, null or not strings are left for the schema to judge.
 */
export function sanitizeFields(body: unknown, sanitizers: FieldSanitizers): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return body;
  }

  const cleaned: Record<string, unknown> = { ...body };
  for (const [field, sanitize] of Object.entries(sanitizers)) {
    const value = cleaned[field];
    if (typeof value === 'string') {
      cleaned[field] = sanitize(value);
    }
  }
  return cleaned;
}
