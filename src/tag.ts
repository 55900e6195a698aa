import { AnsiColor } from './types';
import type { Tag } from './types';
import { colorize } from './format';

/* ------------------------------- Tag factory ------------------------------- */

export function makeDefaultTag(text: string): Tag {
  return text;
}

/** Color-wrapped tag; always closed with a reset so color never leaks past it. */
export function makeColoredTag(color: AnsiColor, text: string): Tag {
  return colorize(color, text);
}

/**
 * Concatenate tags in order with `delimiter` between them (none trailing).
 * The pieces go into one array sized up front and are joined once.
 */
export function joinTags(tags: readonly Tag[], delimiter: string = ''): string {
  if (tags.length === 0) return '';
  if (tags.length === 1) return tags[0];

  const parts: string[] = new Array(delimiter ? tags.length * 2 - 1 : tags.length);
  let p = 0;
  parts[p++] = tags[0];
  for (let i = 1; i < tags.length; i++) {
    if (delimiter) parts[p++] = delimiter;
    parts[p++] = tags[i];
  }
  return parts.join('');
}
