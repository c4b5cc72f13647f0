import logger from './logger.js';

export type RepairResult =
  | { ok: true; value: unknown; step: RepairStep }
  | { ok: false };

export type RepairStep =
  | 'direct'
  | 'extracted'
  | 'trailing_commas'
  | 'quotes'
  | 'unquoted_keys'
  | 'closed_truncation';

/** Past this size the regex-heavy repairs are skipped to avoid catastrophic backtracking. */
const AGGRESSIVE_REPAIR_LIMIT = 50_000;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Cut the outermost JSON object/array out of surrounding prose.
 * Returns the input unchanged when no bracket pair is found.
 */
function extractEnvelope(text: string): string {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start < 0) return text;

  const lastClose = text.lastIndexOf(closeChar);
  return lastClose > start ? text.slice(start, lastClose + 1) : text.slice(start);
}

/** Append the closers a truncated completion never emitted. */
function closeTruncated(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (escaped) { escaped = false; continue; }
    if (ch === '\\' && inString) { escaped = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  const closedString = inString ? '"' : '';
  return text.replace(/,\s*$/, '') + closedString + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for model completions that wrap the payload in
 * markdown fences or prose, or leave trailing commas, single quotes,
 * unquoted keys or a truncated tail.
 *
 * Only text that contains a `{` or `[` is considered; bare scalars in prose
 * ("42", "true") are not treated as an envelope.
 */
export function repairJSON(text: string): RepairResult {
  if (typeof text !== 'string' || !/[{[]/.test(text)) return { ok: false };

  const unfenced = text
    .replace(/^\s*```(?:json)?\s*\n?/i, '')
    .replace(/\n?```\s*$/i, '')
    .trim();

  const direct = tryParse(unfenced);
  if (direct.ok) return { ...direct, step: 'direct' };

  const extracted = extractEnvelope(unfenced);
  if (extracted !== unfenced) {
    const parsed = tryParse(extracted);
    if (parsed.ok) return { ...parsed, step: 'extracted' };
  }

  const noTrailing = extracted.replace(/,\s*([\]}])/g, '$1');
  const trailing = tryParse(noTrailing);
  if (trailing.ok) return { ...trailing, step: 'trailing_commas' };

  if (noTrailing.length > AGGRESSIVE_REPAIR_LIMIT) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return { ok: false };
  }

  const requoted = noTrailing
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
  const quoted = tryParse(requoted);
  if (quoted.ok) return { ...quoted, step: 'quotes' };

  const keyed = requoted.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const unquotedKeys = tryParse(keyed);
  if (unquotedKeys.ok) return { ...unquotedKeys, step: 'unquoted_keys' };

  const closed = closeTruncated(keyed);
  if (closed !== keyed) {
    const truncated = tryParse(closed);
    if (truncated.ok) return { ...truncated, step: 'closed_truncation' };
  }

  logger.debug({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return { ok: false };
}
