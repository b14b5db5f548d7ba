const HREF_PATTERN = /href\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;
// EDGAR lists the XSLT-rendered copy (".../xslF345X05/form4.xml") before the raw document.
const RENDERED_DIR_PATTERN = /(^|\/)xsl[^/]*\//i;

function isAttachmentPath(href: string) {
  const pathOnly = href.split(/[?#]/)[0] ?? "";
  return pathOnly.toLowerCase().endsWith(".xml") && !RENDERED_DIR_PATTERN.test(pathOnly);
}

export function absolutize(pageUrl: string, href: string): string | null {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

/** First machine-readable filing attachment linked from an index page, as an absolute URL. */
export function findAttachmentUrl(html: string, pageUrl: string): string | null {
  for (const match of html.matchAll(HREF_PATTERN)) {
    const href = (match[1] ?? match[2] ?? "").trim();
    if (!href || !isAttachmentPath(href)) continue;
    const resolved = absolutize(pageUrl, href);
    if (resolved) return resolved;
  }
  return null;
}
