/**
 * Regular expressions for one markdown task line:
 *
 *   [<marker>] (<priority>)? <name> <attribute>*
 *
 * The name is either a `[[wiki link]]` or, without brackets, the rest of the
 * line. Attributes are scanned independently of each other, so they may come
 * in any order and unknown tokens are ignored.
 */

// Checkbox, optional priority group, then a bracketed or plain name and the tail
export const BASE_LINE_RE = /^\[([^\]])\]\s*(?:\(([A-Z]+)\)\s*)?(?:\[\[(.+?)\]\]|(.+))\s*(.*)$/;

// A task line in a document: optional indentation then "- ["
export const TASK_LINE_RE = /^\s*- \[/;

// Leading indentation and list markers ("-", "*")
export const LIST_MARKER_RE = /^[\s*-]+/;

// Match id:123 (must be standalone token)
export const ID_RE = /(?:^|\s)id:(\d+)(?=\s|$)/;

// Match note:"..." where "" is an escaped quote
export const NOTE_RE = /(?:^|\s)note:"((?:[^"]|"")*)"/;

// Match +project, @context, #tag at the start of a token
export const PROJECT_RE = /(?:^|\s)\+(\S+)/;
export const CONTEXT_RE = /(?:^|\s)@(\S+)/g;
export const TAG_RE = /(?:^|\s)#(\S+)/g;

/** Date-valued attribute names */
export type DateAttribute = 'created' | 'due' | 'updated' | 'completed';

/** Literal value that clears a nullable date attribute */
export const EMPTY_VALUE = '""';

const DATE_ATTR_RE: Record<DateAttribute, RegExp> = {
  created: /(?:^|\s)created:(\S+)/,
  due: /(?:^|\s)due:(\S+)/,
  updated: /(?:^|\s)updated:(\S+)/,
  completed: /(?:^|\s)completed:(\S+)/,
};

/** Collect all matches from a global regex into an array of the first capture group */
export function allMatches(re: RegExp, str: string): string[] {
  const results: string[] = [];
  // Reset lastIndex in case the regex was used before
  re.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(str)) !== null) {
    results.push(m[1]!);
  }
  return results;
}

/** Raw value of a date attribute (first occurrence), or null when absent */
export function matchDateAttribute(attr: DateAttribute, tail: string): string | null {
  const m = DATE_ATTR_RE[attr].exec(tail);
  return m ? m[1]! : null;
}

/** Raw explicit id of an attribute tail, or null when absent or not positive */
export function matchId(tail: string): number | null {
  const m = ID_RE.exec(tail);
  if (!m) return null;
  const id = Number.parseInt(m[1]!, 10);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** Split the note segment out of an attribute tail */
export function extractNote(tail: string): { note: string | null; rest: string } {
  const m = NOTE_RE.exec(tail);
  if (!m) return { note: null, rest: tail };
  const rest = tail.slice(0, m.index) + ' ' + tail.slice(m.index + m[0].length);
  return { note: m[1]!.replace(/""/g, '"'), rest };
}
