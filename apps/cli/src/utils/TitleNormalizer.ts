/**
 * TitleNormalizer: turns catalog names and scraped titles into comparison keys.
 *
 * Regional tags, release flags and stylistic punctuation are erased so that
 * "Super Game (USA) [!]" and "Super-Game" compare as the same title.
 * The result is only ever used as a key; it cannot be mapped back.
 */

// ASCII punctuation minus the hyphen, which becomes a word break instead
const PUNCTUATION_EXCEPT_HYPHEN = /[!"#$%&'()*+,.\/:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Remove every `[...]` and `(...)` group together with the whitespace in
 * front of it. Groups do not nest.
 */
export function stripBracketedGroups(text: string): string {
  return text
    .replace(/\s*\[[^\]]*\]/g, '')
    .replace(/\s*\([^)]*\)/g, '');
}

export function normalizeTitle(title: string | null | undefined): string {
  if (!title) return '';

  let text = title.toLowerCase();
  text = stripBracketedGroups(text);
  text = text.replace(PUNCTUATION_EXCEPT_HYPHEN, '');
  text = text.replace(/-/g, ' ');
  return text.replace(/\s+/g, ' ').trim();
}
