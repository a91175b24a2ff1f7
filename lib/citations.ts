// lib/citations.ts
import type { Citation, CitationMarker } from "./types";

export const DOC_MARKER_SOURCE = String.raw`\[\[doc:([^\]\s]+)\]\]`;

export type FilenameLookup = (fileId: string) => string | undefined;

export interface ResolvedAnswer {
  text: string;
  citations: Citation[];
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrites citation markers into numbered footnote references.
 *
 * `[[doc:<id>]]` is always recognised; `markers` adds the literal strings the
 * provider reported for this answer (e.g. `【4:0†source】`). Footnotes are
 * numbered per filename in order of first appearance. Markers whose id the
 * lookup does not know are left in the text untouched.
 */
export function resolveCitations(
  text: string,
  lookup: FilenameLookup,
  markers: readonly CitationMarker[] = [],
): ResolvedAnswer {
  const markerIds = new Map<string, string>();
  for (const m of markers) {
    if (m.text && !markerIds.has(m.text)) markerIds.set(m.text, m.fileId);
  }

  const literal = [...markerIds.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  const pattern = new RegExp([DOC_MARKER_SOURCE, ...literal].join("|"), "g");

  const byFilename = new Map<string, Citation>();
  const body = text.replace(pattern, (match: string, docId: string | undefined) => {
    const fileId = docId ?? markerIds.get(match);
    if (!fileId) return match;
    const filename = lookup(fileId);
    if (!filename) return match;

    let citation = byFilename.get(filename);
    if (!citation) {
      citation = { index: byFilename.size + 1, fileId, filename };
      byFilename.set(filename, citation);
    }
    return `[${citation.index}]`;
  });

  const citations = [...byFilename.values()];
  if (citations.length === 0) return { text: body, citations };

  const footnotes = citations.map(c => `[${c.index}] ${c.filename}`).join("\n");
  return { text: `${body}\n\n${footnotes}`, citations };
}
