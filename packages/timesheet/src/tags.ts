/**
 * Ticket-tag handling for pull-request titles.
 *
 * Titles such as "Fix login bug [eng-482]" or "ENG 99: cache warmup" carry a
 * ticket reference; it becomes the task's `#eng482` tag and is removed from
 * the visible name.
 */

const TICKET_PATTERN = /\beng\s*[#-]?\s*(\d+)\b/i;
const TICKET_PATTERN_ALL = /\beng\s*[#-]?\s*\d+\b/gi;
const EMPTY_BRACKETS = /\[\s*\]/g;
const WHITESPACE_RUN = /\s+/g;

/** Return `eng<digits>` for the first ticket reference in a title, or null */
export function extractTicketTag(title: string): string | null {
  const match = TICKET_PATTERN.exec(title);
  return match ? `eng${match[1]}` : null;
}

/** Remove ticket references, leftover empty brackets and extra whitespace */
export function stripTicketTag(title: string): string {
  return title
    .replace(TICKET_PATTERN_ALL, '')
    .replace(EMPTY_BRACKETS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Build a task label from a pull-request title. The ticket tag is used when
 * present, the repository name otherwise.
 */
export function buildTaskLabel(title: string, repo: string): string {
  const tag = extractTicketTag(title) ?? repo;
  const name = stripTicketTag(title);
  return name ? `${name} #${tag}` : `#${tag}`;
}
