function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Extracts a JSON value from model output: the whole text, then the
 * body of a ``` fence, then the span between the first `{` and the
 * last `}`.
 */
export function parseJsonResponse(raw: string): { ok: true; value: unknown } | { ok: false } {
  const text = raw.trim();

  const direct = tryParse(text);
  if (direct.ok) return direct;

  if (text.startsWith('```')) {
    const lines = text.split(/\r?\n/);
    if (lines.length >= 2) {
      const body = lines.slice(1, lines.at(-1)?.trim().startsWith('```') ? -1 : undefined).join('\n').trim();
      const fenced = tryParse(body);
      if (fenced.ok) return fenced;
    }
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    return tryParse(text.slice(start, end + 1));
  }

  return { ok: false };
}
