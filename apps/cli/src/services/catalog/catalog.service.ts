/**
 * Reads and writes Logiqx-style catalog files (`<datafile>` with a
 * `<header>` and one `<game>` or `<machine>` per release).
 *
 * Entries keep the node produced by the parser so that everything the
 * curator does not look at (roms, releases, attributes) is written back as
 * it was read.
 */
import * as fs from 'fs';
import * as path from 'path';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import type { CatalogDocument, CatalogEntry, XmlPayload } from '@dat-curator/shared-types';
import { CatalogError, OutputError, describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { extractHeader } from './header';
import { ATTRIBUTE_PREFIX, attribute, childNodes, element, isXmlNode, tagOf } from './xml-nodes';

export const ROOT_TAG = 'datafile';
export const ENTRY_TAGS: readonly string[] = ['game', 'machine'];

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export class CatalogService {
  private xmlParser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    // Numeric character references (&#233; &#xE9;) are only decoded with this on
    htmlEntities: true,
  });

  private xmlBuilder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    format: true,
    indentBy: '\t',
    suppressEmptyNode: true,
  });

  /**
   * Parses catalog XML. `source` only names the document in errors.
   */
  parse(xml: string, source: string): CatalogDocument {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new CatalogError(`Error parsing catalog '${source}': ${msg} (line ${line}, column ${col})`, source);
    }

    const parsed: unknown = this.xmlParser.parse(xml);
    const nodes = Array.isArray(parsed) ? parsed.filter(isXmlNode) : [];
    const root = nodes.find((node) => tagOf(node) !== undefined);
    const rootTag = root ? tagOf(root) : undefined;
    if (!root || rootTag !== ROOT_TAG) {
      throw new CatalogError(
        `Catalog '${source}' has root <${rootTag ?? 'none'}>, expected <${ROOT_TAG}>`,
        source
      );
    }

    let header: CatalogDocument['header'] = null;
    const entries: CatalogEntry[] = [];

    for (const child of childNodes(root)) {
      const tag = tagOf(child);
      if (tag === 'header' && header === null) {
        header = extractHeader(child);
      } else if (tag !== undefined && ENTRY_TAGS.includes(tag)) {
        entries.push({
          displayName: attribute(child, 'name') ?? '',
          index: entries.length,
          payload: child,
        });
      }
    }

    return { header, entries };
  }

  async read(filePath: string): Promise<CatalogDocument> {
    logger.info(`[Catalog] Reading ${filePath}`);

    let xml: string;
    try {
      xml = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new CatalogError(`Input catalog '${filePath}' could not be read: ${describeError(error)}`, filePath, error);
    }

    const document = this.parse(xml, filePath);
    logger.info(`[Catalog] Parsed ${document.entries.length} entries from ${filePath}`);
    return document;
  }

  serialize(header: XmlPayload, entries: readonly CatalogEntry[]): string {
    const root = element(ROOT_TAG, [header, ...entries.map((entry) => entry.payload)]);
    const body: string = this.xmlBuilder.build([root]);
    return `${XML_DECLARATION}\n${body.trim()}\n`;
  }

  async write(filePath: string, header: XmlPayload, entries: readonly CatalogEntry[]): Promise<void> {
    logger.info(`[Catalog] Writing ${entries.length} entries to ${filePath}`);
    try {
      await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await fs.promises.writeFile(filePath, this.serialize(header, entries), 'utf-8');
    } catch (error) {
      throw new OutputError(`Error writing curated catalog '${filePath}': ${describeError(error)}`, filePath, error);
    }
    logger.debug(`[Catalog] Wrote ${filePath}`);
  }

  /** Number of entries in the catalog at `filePath` */
  async countEntries(filePath: string): Promise<number> {
    const document = await this.read(filePath);
    return document.entries.length;
  }
}
