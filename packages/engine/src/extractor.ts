// Quoted strings with a slash in them, excluding quotes, parens, ASCII whitespace, `:`, `;` and `,`.
// Unicode spaces such as NBSP stay part of the literal.
const GREEDY_PATTERN =
  /"([^"'() \t\n\x0B\f\r:;,]+\/[^"'() \t\n\x0B\f\r:;,]+)"|'([^"'() \t\n\x0B\f\r:;,]+\/[^"'() \t\n\x0B\f\r:;,]+)'/g;

// Quoted or parenthesized runs of URL-ish characters only.
const CONSERVATIVE_PATTERN = /"([-\w./:?=]+)"|'([-\w./:?=]+)'|\(([-\w./:?=]+)\)/g;

/**
 * Pull URL-like string literals out of script text.
 *
 * The text is scanned line by line, so a literal that spans a newline is never
 * matched. Results keep first-seen order with duplicates removed.
 */
export function extractCandidates(text: string, greedy: boolean): string[] {
  const found = new Set<string>();
  const pattern = greedy ? GREEDY_PATTERN : CONSERVATIVE_PATTERN;

  for (const line of text.split("\n")) {
    for (const match of line.matchAll(pattern)) {
      for (const group of match.slice(1)) {
        if (group !== undefined) {
          found.add(group);
        }
      }
    }
  }

  return Array.from(found);
}
