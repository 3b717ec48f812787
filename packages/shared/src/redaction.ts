const REDACTION_PLACEHOLDER = '[REDACTED]';

// Release-host credential formats
const tokenPatterns = [
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
  /github_pat_[a-zA-Z0-9_]{20,}/g, // GitHub fine-grained token
];

// Patterns for environment variables
const envVarPatterns = [/(?:TOKEN|SECRET|PASSWORD)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

// Authorization headers echoed by HTTP clients
const authHeaderPattern = /\b(?:Bearer|token)\s+[a-zA-Z0-9_.-]{16,}/g;

// Pattern for private keys
const privateKeyPattern = /-----BEGIN [A-Z ]*PRIVATE KEY-----(?:.|\n|\r)*?-----END [A-Z ]*PRIVATE KEY-----/g;

const allPatterns = [...tokenPatterns, ...envVarPatterns, authHeaderPattern, privateKeyPattern];

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}

/**
 * Redacts a value that is about to be persisted (trace lines, summaries).
 * Errors are flattened first so their messages are covered too.
 */
export function redactForLogs(input: unknown): unknown {
  if (input instanceof Error) {
    return redact({ name: input.name, message: input.message });
  }
  return redact(input);
}
