/**
 * IRC formatting control codes and line hygiene.
 */

export const BOLD = '\x02';
export const COLOR = '\x03';
export const RESET = '\x0f';
export const RED = '4';

/** Leaves room for the `:nick!user@host NOTICE #channel :` prefix within 512 bytes */
export const MAX_LINE_LENGTH = 400;

const ELLIPSIS = '...';

export function bold(text: string): string {
  return `${BOLD}${text}${BOLD}`;
}

/**
 * Red and bold, closed with a full formatting reset.
 */
export function alert(text: string): string {
  return `${COLOR}${RED}${BOLD}${text}${RESET}`;
}

export function firstLine(text: string): string {
  const newlineIndex = text.indexOf('\n');
  const line = newlineIndex === -1 ? text : text.slice(0, newlineIndex);
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Collapse embedded line breaks and cap the length so one rendered line is
 * always exactly one protocol message.
 */
export function sanitizeLine(text: string, maxLength = MAX_LINE_LENGTH): string {
  const flat = text.replace(/[\r\n]+/g, ' ');
  if (flat.length <= maxLength) {
    return flat;
  }
  return flat.slice(0, maxLength - ELLIPSIS.length) + ELLIPSIS;
}
