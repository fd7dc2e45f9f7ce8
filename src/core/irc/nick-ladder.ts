/**
 * Nickname fallback ladder
 *
 * Several instances of the bridge can briefly run side by side (rolling
 * restarts, scale-out), so the nickname we want may be held by our own
 * previous process. The ladder gives every instance the same ordered list of
 * alternatives derived from the primary nickname alone:
 *
 *   Hookbot, tobkooH, Hookbot_, tobkooH_, ... Hookbot____, tobkooH____,
 *   Ubbxobg, gboxbbU, Ubbxobg_, gboxbbU_, ... (rot13 of the above, up to 3 underscores)
 */

const MAX_UNDERSCORES = 4;
const MAX_CIPHER_UNDERSCORES = 3;

/**
 * RFC 1459 case mapping: letters are case-insensitive and `[]\~` are the
 * upper-case forms of `{}|^`.
 */
export function ircFold(name: string): string {
  return name
    .toLowerCase()
    .replace(/\[/g, '{')
    .replace(/\]/g, '}')
    .replace(/\\/g, '|')
    .replace(/~/g, '^');
}

export function rot13(text: string): string {
  return text.replace(/[a-z]/gi, (char) => {
    const base = char <= 'Z' ? 65 : 97;
    return String.fromCharCode(((char.charCodeAt(0) - base + 13) % 26) + base);
  });
}

export function reverse(text: string): string {
  return Array.from(text).reverse().join('');
}

export function buildNickLadder(primary: string): string[] {
  const inverse = reverse(primary);
  const candidates: string[] = [];

  for (let i = 0; i <= MAX_UNDERSCORES; i++) {
    const suffix = '_'.repeat(i);
    candidates.push(`${primary}${suffix}`, `${inverse}${suffix}`);
  }
  for (let i = 0; i <= MAX_CIPHER_UNDERSCORES; i++) {
    const suffix = '_'.repeat(i);
    candidates.push(rot13(`${primary}${suffix}`), rot13(`${inverse}${suffix}`));
  }

  const seen = new Set<string>();
  return candidates.filter((nick) => {
    const key = ircFold(nick);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export class NickLadder {
  readonly primary: string;
  readonly nicks: readonly string[];

  constructor(primary: string) {
    this.primary = primary;
    this.nicks = buildNickLadder(primary);
  }

  at(index: number): string | undefined {
    return this.nicks[index];
  }

  /** -1 when the server gave us a nick that is not on the ladder */
  indexOf(nick: string): number {
    const key = ircFold(nick);
    return this.nicks.findIndex((candidate) => ircFold(candidate) === key);
  }

  isPrimary(nick: string): boolean {
    return ircFold(nick) === ircFold(this.primary);
  }
}
