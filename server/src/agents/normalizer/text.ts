/** Markdown scraping helpers shared by the pattern rules. */

export interface Anchor<T> {
  index: number;
  end: number;
  value: T;
}

function escapeLabel(label: string): string {
  return label.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+');
}

function labelGroup(labels: readonly string[]): string {
  return labels.map(escapeLabel).join('|');
}

/** Strip bold markers, list bullets and wrapping quotes from a scraped value. */
export function clean(value: string): string {
  return value
    .replace(/\*\*/g, '')
    .replace(/^[\s>*+-]+/, '')
    .replace(/[*_\s]+$/, '')
    .replace(/^["'“”]+|["'“”]+$/g, '')
    .trim();
}

/**
 * All matches of `patterns`, sorted by position. Each anchor's block runs
 * to the next anchor's start so fields never bleed across entries.
 */
export function anchors<T>(
  text: string,
  patterns: readonly RegExp[],
  build: (match: RegExpExecArray) => T | null,
): Array<Anchor<T> & { block: string }> {
  const found: Array<Anchor<T>> = [];
  for (const pattern of patterns) {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    const re = new RegExp(pattern.source, flags);
    for (let m = re.exec(text); m !== null; m = re.exec(text)) {
      if (m[0].length === 0) {
        re.lastIndex += 1;
        continue;
      }
      const index = m.index;
      const value = build(m);
      if (value !== null && !found.some((a) => a.index === index)) {
        found.push({ index, end: index + m[0].length, value });
      }
    }
  }
  found.sort((a, b) => a.index - b.index);
  return found.map((anchor, i) => ({
    ...anchor,
    block: text.slice(anchor.end, found[i + 1]?.index ?? text.length),
  }));
}

/** Leading noise before a label: quote marks, bullets, headings, list numbers. */
export const LABEL_PREFIX = String.raw`[ \t>*#+\-\d.)]*`;

/** `Label: value` at a line start or after a `|` separator; the value stops at the next `|`. */
function labelLine(labels: readonly string[]): RegExp {
  return new RegExp(
    String.raw`(?:^|\|)${LABEL_PREFIX}(?:\*\*)?(?:${labelGroup(labels)})(?:\*\*)?[ \t]*:(?:\*\*)?[ \t]*([^|\n]*)`,
    'im',
  );
}

/** Inline value of the first `Label: value` line in `block`, cleaned. */
export function field(block: string, labels: readonly string[]): string {
  const match = labelLine(labels).exec(block);
  return match ? clean(match[1] ?? '') : '';
}

/**
 * List under a label: the inline value split on commas/semicolons, or the
 * bullet/numbered lines that follow a bare `Label:` line.
 */
export function listField(block: string, labels: readonly string[]): string[] {
  const headingOnly = new RegExp(
    `^[ \\t]*#{1,6}[ \\t]*(?:\\*\\*)?(?:${labelGroup(labels)})(?:\\*\\*)?[ \\t]*:?[ \\t]*$`,
    'im',
  );
  const labelled = labelLine(labels).exec(block);
  const heading = labelled ? null : headingOnly.exec(block);
  const match = labelled ?? heading;
  if (!match) return [];

  const inline = labelled ? clean(labelled[1] ?? '') : '';
  if (inline) {
    return inline.split(/[,;]\s*/).map(clean).filter(Boolean);
  }

  const items: string[] = [];
  const rest = block.slice(match.index + match[0].length).split('\n');
  for (const line of rest) {
    const trimmed = line.trim();
    if (!trimmed) {
      if (items.length > 0) break;
      continue;
    }
    const bullet = /^(?:[*+-]|\d+[.)])\s+(.+)$/.exec(trimmed);
    if (!bullet) break;
    const item = clean(bullet[1] ?? '');
    if (item) items.push(item);
  }
  return items;
}

/**
 * Body of a `## Label` section (up to the next heading) or of a `Label:`
 * paragraph (up to the next labelled line or heading). Empty when absent.
 */
export function section(text: string, labels: readonly string[]): string {
  const heading = new RegExp(
    `^[ \\t]*#{1,6}[ \\t]*(?:\\*\\*)?(?:${labelGroup(labels)})(?:\\*\\*)?[ \\t]*:?[ \\t]*$`,
    'im',
  ).exec(text);
  if (heading) {
    const rest = text.slice(heading.index + heading[0].length);
    const next = /^[ \t]*#{1,6}\s/m.exec(rest);
    return (next ? rest.slice(0, next.index) : rest).trim();
  }

  const labelled = labelLine(labels).exec(text);
  if (!labelled) return '';
  const lines = [labelled[1] ?? ''];
  const rest = text.slice(labelled.index + labelled[0].length).split('\n').slice(1);
  for (const line of rest) {
    if (/^[ \t]*#{1,6}\s/.test(line) || /^[ \t>*-]*(?:\*\*)?[A-Z][\w ()-]{0,40}(?:\*\*)?:/.test(line)) break;
    lines.push(line);
  }
  return lines.join('\n').replace(/\*\*/g, '').trim();
}

/** First prose line of a block: not a heading, not a labelled field. */
export function firstProseLine(block: string): string {
  for (const line of block.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || /^#{1,6}\s/.test(trimmed) || /^[-*_]{3,}$/.test(trimmed)) continue;
    if (/^[>*+-]*\s*(?:\*\*)?[A-Za-z][\w ]{0,30}(?:\*\*)?\s*:/.test(trimmed)) continue;
    return clean(trimmed);
  }
  return '';
}

/**
 * URL comparison key: trailing slashes dropped, scheme and host lowercased.
 * Paths and queries stay case-sensitive.
 */
export function urlKey(url: string): string {
  return url
    .trim()
    .replace(/\/+$/, '')
    .replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?#]+/i, (origin) => origin.toLowerCase());
}

/**
 * Keep the first entry for each natural key, compared after trimming.
 * Entries with an empty key are kept.
 */
export function dedupeBy<T>(entries: readonly T[], key: (entry: T) => string): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const entry of entries) {
    const k = key(entry).trim();
    if (k) {
      if (seen.has(k)) continue;
      seen.add(k);
    }
    out.push(entry);
  }
  return out;
}
