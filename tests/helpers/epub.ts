import JSZip from 'jszip';

export interface EpubChapter {
  id: string;
  href: string;
  xhtml: string;
  /** Listed in the spine (default true) */
  inSpine?: boolean;
}

export function xhtmlPage(title: string, body: string): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<html xmlns="http://www.w3.org/1999/xhtml">',
    `<head><title>${title}</title></head>`,
    `<body>${body}</body>`,
    '</html>',
  ].join('\n');
}

const CONTAINER_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">',
  '<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>',
  '</container>',
].join('\n');

/**
 * Build an EPUB in memory. `spineOrder` lists chapter ids in reading order;
 * chapters are added to the manifest in the order given.
 */
export async function buildEpub(chapters: EpubChapter[], spineOrder?: string[]): Promise<Buffer> {
  const manifest = chapters
    .map((chapter) => `<item id="${chapter.id}" href="${chapter.href}" media-type="application/xhtml+xml"/>`)
    .concat('<item id="css" href="style.css" media-type="text/css"/>')
    .join('\n');
  const spine = (spineOrder ?? chapters.filter((chapter) => chapter.inSpine !== false).map((chapter) => chapter.id))
    .map((id) => `<itemref idref="${id}"/>`)
    .join('\n');

  const opf = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="uid">',
    '<metadata xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:title>Test Book</dc:title></metadata>',
    `<manifest>\n${manifest}\n</manifest>`,
    `<spine>\n${spine}\n</spine>`,
    '</package>',
  ].join('\n');

  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' });
  zip.file('META-INF/container.xml', CONTAINER_XML);
  zip.file('OEBPS/content.opf', opf);
  zip.file('OEBPS/style.css', 'p { margin: 0; }');
  for (const chapter of chapters) {
    zip.file(`OEBPS/${chapter.href}`, chapter.xhtml);
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

export async function readEntry(buffer: Buffer, entryPath: string): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  const entry = zip.file(entryPath);
  if (!entry) {
    throw new Error(`Entry ${entryPath} not found`);
  }
  return entry.async('string');
}
