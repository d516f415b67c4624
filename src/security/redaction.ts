export const EMPTY_TOKEN_SENTINEL = '*[EMPTY]*';

const MASK_VISIBLE_CHARS = 8;
const MASK_MIN_LENGTH = MASK_VISIBLE_CHARS * 2;

/**
 * Display-safe form of a credential. Secrets of 16 characters or more keep
 * their first and last 8 characters so log lines can be correlated with a
 * token; shorter ones are masked entirely.
 */
export function maskToken(token: string | undefined): string {
  if (!token) {
    return EMPTY_TOKEN_SENTINEL;
  }

  if (token.length < MASK_MIN_LENGTH) {
    return '*'.repeat(token.length);
  }

  return `${token.slice(0, MASK_VISIBLE_CHARS)}${'*'.repeat(token.length - MASK_MIN_LENGTH)}${token.slice(-MASK_VISIBLE_CHARS)}`;
}

export interface SanitizeRule {
  name: string;
  pattern: RegExp;
  replacement: string;
}

// Order matters: later rules see the markers written by earlier ones.
// `url_userinfo` must follow `secret_pair`: a redacted pair can sit inside userinfo.
export const SANITIZE_RULES: readonly SanitizeRule[] = [
  { name: 'jwt', pattern: /\beyJ[A-Za-z0-9._-]+/g, replacement: '[JWT_TOKEN]' },
  { name: 'opaque_key', pattern: /\b[A-Za-z0-9]{32,}\b/g, replacement: '[API_KEY]' },
  { name: 'bearer', pattern: /Bearer\s+[A-Za-z0-9._~+/=-]+/g, replacement: 'Bearer [TOKEN]' },
  { name: 'basic', pattern: /Basic\s+[A-Za-z0-9+/=]+/g, replacement: 'Basic [CREDENTIALS]' },
  {
    name: 'secret_pair',
    pattern: /(password|secret|key|token)\s*[:=]\s*[^\s'"]+/gi,
    replacement: '$1=[REDACTED]'
  },
  { name: 'url_userinfo', pattern: /:\/\/[^\s:/@]+:[^\s/@]+@/g, replacement: '://[USER]:[PASS]@' }
];

const MAX_SANITIZE_PASSES = 4;

function applyRules(message: string): string {
  let sanitized = message;
  for (const rule of SANITIZE_RULES) {
    sanitized = sanitized.replace(rule.pattern, rule.replacement);
  }
  return sanitized;
}

/** Applies the rules until the text stops changing, so a second call is a no-op. */
export function sanitizeMessage(message: string): string {
  let current = message;
  for (let pass = 0; pass < MAX_SANITIZE_PASSES; pass += 1) {
    const next = applyRules(current);
    if (next === current) {
      return current;
    }
    current = next;
  }
  return current;
}

const SENSITIVE_LOG_KEYS = new Set([
  'authorization',
  'auth',
  'token',
  'accesstoken',
  'access_token',
  'password',
  'pass',
  'secret',
  'apikey',
  'api_key',
  'cookie'
]);

function redactValue(value: unknown, options: { depth: number; maxDepth: number; seen: WeakSet<object> }): unknown {
  if (typeof value === 'string') {
    return sanitizeMessage(value);
  }

  if (!value || typeof value !== 'object') {
    return value;
  }

  if (options.depth >= options.maxDepth) {
    return '[REDACTED:DEPTH_LIMIT]';
  }

  if (options.seen.has(value)) {
    return '[REDACTED:CYCLE]';
  }
  // `seen` holds the current ancestors only; shared siblings are not cycles.
  options.seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => redactValue(item, { ...options, depth: options.depth + 1 }));
    }

    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      const normalizedKey = key.trim().toLowerCase();
      if (SENSITIVE_LOG_KEYS.has(normalizedKey)) {
        result[key] = '[REDACTED]';
        continue;
      }
      result[key] = redactValue(nested, { ...options, depth: options.depth + 1 });
    }
    return result;
  } finally {
    options.seen.delete(value);
  }
}

export function redactForLog(value: unknown): unknown {
  return redactValue(value, { depth: 0, maxDepth: 6, seen: new WeakSet<object>() });
}

export function sanitizeUrlForLog(url: URL): string {
  const sanitized = new URL(url.toString());
  sanitized.username = '';
  sanitized.password = '';
  return sanitized.toString();
}

export function truncateForLog(text: string, maxLength = 500): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
