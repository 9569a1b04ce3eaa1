import { FormatError } from "./errors";

/** Question index → SQL text, iterated in ascending index order. */
export type QuerySet = ReadonlyMap<number, string>;

export type ParseResult =
  | { ok: true; querySet: QuerySet }
  | { ok: false; error: FormatError };

export interface ParseOptions {
  expectedCount: number;
}

export interface MarkerMatch {
  token: string; // text between the two "--" delimiters, starting with a digit
  line: number; // 1-based
  body: string; // trimmed text up to the next marker or end of file
}

// "--3--" at the start of a line. Dashed text that does not start with a
// digit, such as "--TODO--" or a "------" divider, is an ordinary SQL comment.
const MARKER = /^[ \t]*--(\d[^\s-]*)--/gm;

/**
 * Find every marker in a file along with the text that follows it.
 */
export function scanMarkers(text: string): MarkerMatch[] {
  const normalized = text.replace(/\r\n?/g, "\n");
  const found: { token: string; start: number; end: number }[] = [];

  for (const match of normalized.matchAll(MARKER)) {
    const start = match.index ?? 0;
    found.push({ token: match[1], start, end: start + match[0].length });
  }

  return found.map((marker, i) => {
    const next = found[i + 1];
    const body = normalized.slice(marker.end, next ? next.start : normalized.length);
    return {
      token: marker.token,
      line: normalized.slice(0, marker.start).split("\n").length,
      body: body.trim(),
    };
  });
}

/**
 * True when the SQL holds nothing but comments and whitespace.
 */
export function isBlankSql(sql: string): boolean {
  const stripped = sql
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .replace(/--[^\n]*/g, "");
  return stripped.trim().length === 0;
}

/**
 * Split a submission into its questions.
 *
 * A file without any marker is accepted only when a single question is
 * expected, in which case the whole file is question 1. Files with fewer
 * markers than expected parse fine; the missing questions are graded as
 * unanswered.
 */
export function parseQuerySet(text: string, options: ParseOptions): ParseResult {
  const markers = scanMarkers(text);

  if (markers.length === 0) {
    if (options.expectedCount !== 1) {
      return fail(`No question markers found; expected --1-- through --${options.expectedCount}--.`);
    }
    const body = text.trim();
    if (isBlankSql(body)) {
      return fail("The file does not contain a query.");
    }
    return { ok: true, querySet: new Map([[1, body]]) };
  }

  const entries = new Map<number, string>();
  for (const marker of markers) {
    if (!/^\d+$/.test(marker.token)) {
      return fail(`Marker --${marker.token}-- on line ${marker.line} is not a question number.`);
    }
    const index = Number(marker.token);
    if (index < 1) {
      return fail(`Marker --${marker.token}-- on line ${marker.line} must be a positive number.`);
    }
    if (index > options.expectedCount) {
      return fail(
        `Marker --${index}-- on line ${marker.line} is beyond the ${options.expectedCount} expected question(s).`
      );
    }
    if (entries.has(index)) {
      return fail(`Marker --${index}-- appears more than once.`);
    }
    if (isBlankSql(marker.body)) {
      return fail(`Marker --${index}-- found, but no query follows it.`);
    }
    entries.set(index, marker.body);
  }

  const ordered = [...entries.entries()].sort(([a], [b]) => a - b);
  return { ok: true, querySet: new Map(ordered) };
}

function fail(message: string): ParseResult {
  return { ok: false, error: new FormatError(message) };
}
