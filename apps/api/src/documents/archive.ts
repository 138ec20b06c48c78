import JSZip from 'jszip';

const CORE_PROPERTIES = 'docProps/core.xml';
const CORE_DATES = /(<dcterms:(?:created|modified)\b[^>]*>)[^<]*(<\/dcterms:(?:created|modified)>)/g;
// Per-save random identifiers Office writers stamp on slides and shapes.
const CREATION_IDS = /(<p14:creationId\b[^>]*\bval=")\d+(")/g;
const SHAPE_IDS = /(<a16:creationId\b[^>]*\bid="\{)[0-9A-Fa-f-]+(\}")/g;

function sequentialGuid(n: number): string {
  const hex = n.toString(16).toUpperCase().padStart(12, '0');
  return `00000000-0000-4000-8000-${hex}`;
}

/**
 * Rewrites an Office archive so that it no longer depends on the wall clock or
 * on random ids: every entry date and the core-properties dates become
 * `instant`, and creation ids are renumbered in entry order.
 */
export async function normaliseArchive(content: Buffer, instant: Date): Promise<Buffer> {
  const zip = await JSZip.loadAsync(content);
  const stamp = instant.toISOString().replace(/\.\d{3}Z$/, 'Z');

  const xmlPaths: string[] = [];
  zip.forEach((path, entry) => {
    if (!entry.dir && path.endsWith('.xml')) xmlPaths.push(path);
  });

  let counter = 0;
  for (const path of xmlPaths.sort()) {
    const entry = zip.file(path);
    if (!entry) continue;
    const xml = await entry.async('string');
    let next = xml
      .replace(CREATION_IDS, (_match, open: string, close: string) => `${open}${++counter}${close}`)
      .replace(SHAPE_IDS, (_match, open: string, close: string) => `${open}${sequentialGuid(++counter)}${close}`);
    if (path === CORE_PROPERTIES) {
      next = next.replace(CORE_DATES, `$1${stamp}$2`);
    }
    if (next !== xml) {
      zip.file(path, next);
    }
  }

  zip.forEach((_path, entry) => {
    entry.date = instant;
  });
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
