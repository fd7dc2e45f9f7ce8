/**
 * Filler bodies for failed webhook responses. They say nothing about what
 * went wrong; the details are only in the server log.
 */
export const PLACEHOLDERS: readonly string[] = [
  'It is pitch black. You are likely to be eaten by a grue.',
  'All your base are belong to us',
  'Reticulating splines...',
  'PC LOAD LETTER',
  'Have you tried turning it off and on again?',
  'There is no spoon.',
  'The bird is the word.',
];

export function pickPlaceholder(): string {
  return PLACEHOLDERS[Math.floor(Math.random() * PLACEHOLDERS.length)];
}
