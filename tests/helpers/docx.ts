// Helpers for building Word fixtures in memory and reading generated packages back

import { Document, IParagraphStyleOptions, Packer, Paragraph, TextRun } from 'docx';
import { Open } from 'unzipper';
import { type XmlNode, child, children, parseXml } from '../../src/utils/xml';

export interface FixtureOptions {
  paragraphStyles?: IParagraphStyleOptions[];
}

/**
 * A .docx with one paragraph per entry; strings become single-run paragraphs.
 */
export async function buildDocx(paragraphs: Array<string | Paragraph>, options: FixtureOptions = {}): Promise<Buffer> {
  const doc = new Document({
    sections: [{
      properties: {},
      children: paragraphs.map(paragraph =>
        typeof paragraph === 'string'
          ? new Paragraph({ children: paragraph ? [new TextRun(paragraph)] : [] })
          : paragraph
      )
    }],
    styles: options.paragraphStyles ? { paragraphStyles: options.paragraphStyles } : undefined
  });

  return Packer.toBuffer(doc);
}

export async function readPart(buffer: Buffer, partPath: string): Promise<XmlNode> {
  const directory = await Open.buffer(buffer);
  const file = directory.files.find(entry => entry.path === partPath);
  if (!file) {
    throw new Error(`Package has no ${partPath}`);
  }
  return parseXml((await file.buffer()).toString('utf-8'));
}

/**
 * The `w:p` elements of the document body, in order.
 */
export async function readBodyParagraphs(buffer: Buffer): Promise<XmlNode[]> {
  const document = await readPart(buffer, 'word/document.xml');
  return children(child(document, 'w:body'), 'w:p');
}
