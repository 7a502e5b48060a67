const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Returns the first balanced `open`...`close` span, skipping over string literals. */
function balancedSpan(text: string, open: '{' | '[', close: '}' | ']'): string | undefined {
  const start = text.indexOf(open);
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

/**
 * Pulls a JSON value out of model output: the raw text, a fenced code block,
 * then the first balanced object or array.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();
  const candidates = [
    trimmed,
    FENCED_BLOCK.exec(trimmed)?.[1]?.trim(),
    balancedSpan(trimmed, '{', '}'),
    balancedSpan(trimmed, '[', ']'),
  ];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const parsed = tryParse(candidate);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}
