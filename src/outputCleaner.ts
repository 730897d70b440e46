const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/;

/**
 * Extracts the JSON object from model output that may carry prose or
 * markdown fences around it.
 *
 * A fenced block wins when its content looks like an object; otherwise the
 * text between the first `{` and the last `}` is taken. When neither is
 * found the input comes back unchanged and the caller's parse will fail.
 */
export function cleanJsonOutput(text: string): string {
  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    const inner = fenced[1].trim();
    if (looksLikeObject(inner)) return inner;
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) return text;
  return text.slice(start, end + 1);
}

function looksLikeObject(text: string): boolean {
  return text.startsWith("{") && text.endsWith("}");
}
