/**
 * Lenient JSON reading for model output. Tried in order: the raw text, the text
 * with surrounding code fences removed, and the slice from the first `{` to the
 * last `}`. Returns `null` when none of them parses.
 */
export function parseModelJson(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const unfenced = stripCodeFence(trimmed);
  if (unfenced !== trimmed) {
    const fenced = tryParse(unfenced);
    if (fenced.ok) {
      return fenced.value;
    }
  }

  const sliced = sliceOuterObject(unfenced);
  if (sliced !== undefined) {
    const parsed = tryParse(sliced);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  return null;
}

export const stripCodeFence = (value: string): string =>
  value.replace(/^```[a-zA-Z0-9]*\s*\r?\n?/, '').replace(/\s*```\s*$/, '').trim();

export function sliceOuterObject(value: string): string | undefined {
  const start = value.indexOf('{');
  const end = value.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return undefined;
  }
  return value.slice(start, end + 1);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
