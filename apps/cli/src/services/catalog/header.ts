import type { CatalogHeader, HeaderInfo, XmlPayload } from '@dat-curator/shared-types';
import { logger } from '../../utils/logger';
import { childNodes, element, tagOf, textContent, textElement } from './xml-nodes';

/** Original header elements that are copied into the curated header */
export const CARRIED_HEADER_TAGS: readonly string[] = ['url', 'retool', 'clrmamepro', 'comment'];

const TRAILING_GROUP_PATTERN = /\s*\([^)]*\)$/;

export function extractHeader(headerNode: XmlPayload): CatalogHeader {
  const header: CatalogHeader = { name: null, description: null, carried: [] };

  for (const child of childNodes(headerNode)) {
    const tag = tagOf(child);
    if (tag === 'name') {
      header.name = textContent(child)?.trim() || null;
    } else if (tag === 'description') {
      header.description = textContent(child)?.trim() || null;
    } else if (tag !== undefined && CARRIED_HEADER_TAGS.includes(tag)) {
      logger.debug(`[Catalog] Carrying header element <${tag}>`);
      header.carried.push(child);
    }
  }

  return header;
}

/** Local date as YYYY-MM-DD */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Header for the curated catalog. The system name loses one trailing
 * parenthesized group ("Nintendo - Game Boy (20240101-000000)" becomes
 * "Nintendo - Game Boy") before the label is appended.
 */
export function buildCuratedHeader(original: CatalogHeader | null, info: HeaderInfo): XmlPayload {
  if (!original) {
    logger.warn('[Catalog] No <header> element found in input catalog');
  }

  const originalName = original?.name || 'Unknown System';
  const originalDescription = original?.description || 'Unknown DAT';
  const systemName = originalName.replace(TRAILING_GROUP_PATTERN, '').trim();

  const children: XmlPayload[] = [
    textElement('name', `${systemName} (${info.label})`),
    textElement('description', `${originalDescription} (${info.label})`),
    textElement('version', info.version),
    textElement('date', info.date),
    textElement('author', info.author),
  ];
  if (info.homepage) {
    children.push(textElement('homepage', info.homepage));
  }
  children.push(...(original?.carried ?? []));

  return element('header', children);
}
