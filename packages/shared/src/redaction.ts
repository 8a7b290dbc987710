const REDACTION_PLACEHOLDER = '[REDACTED]';

// Provider key formats that can end up in prompts, errors or config dumps
const apiKeyPatterns = [
  /sk-ant-[a-zA-Z0-9-]{20,}/g, // Anthropic style
  /sk-(?:proj-)?[a-zA-Z0-9]{20,}/g, // OpenAI style
  /gh[pousr]_[a-zA-Z0-9]{20,}/g, // GitHub token
];

const headerPatterns = [/Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g];

// KEY=value assignments copied from .env files
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const allPatterns = [...apiKeyPatterns, ...headerPatterns, ...envVarPatterns];

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

/**
 * Deep-redacts strings inside arrays and plain objects.
 */
export function redact(input: unknown): unknown {
  if (typeof input === 'string') {
    return redactString(input).redacted;
  }

  if (Array.isArray(input)) {
    return input.map(redact);
  }

  if (typeof input === 'object' && input !== null) {
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      redactedObj[key] = redact(value);
    }
    return redactedObj;
  }

  return input;
}
