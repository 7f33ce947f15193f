/**
 * Evidence merging and source citation for routed responses.
 */

import type { CitedSource, EvidenceItem, ResponseMode, WebSearchResult } from "./types";

/**
 * Web results as evidence, ranked after `afterRank`. The URL is the sourceId.
 */
export function webResultsToEvidence(results: readonly WebSearchResult[], afterRank: number): EvidenceItem[] {
  return results.map((result, index) =>
    Object.freeze({
      sourceId: result.url,
      sourceKind: "live-web" as const,
      text: result.extractedText,
      originRank: afterRank + index + 1,
      score: 0,
      title: result.title,
      url: result.url,
    })
  );
}

/**
 * Local evidence followed by web evidence, first occurrence of each
 * sourceId kept.
 */
export function mergeEvidence(
  local: readonly EvidenceItem[],
  webResults: readonly WebSearchResult[]
): EvidenceItem[] {
  const merged: EvidenceItem[] = [];
  const seen = new Set<string>();

  for (const item of [...local, ...webResultsToEvidence(webResults, local.length)]) {
    if (seen.has(item.sourceId)) continue;
    seen.add(item.sourceId);
    merged.push(item);
  }

  return merged;
}

function citationKey(item: EvidenceItem): string {
  if (item.sourceKind === "live-web") return item.url ?? item.sourceId;
  return item.title ?? item.sourceId;
}

/**
 * Sources to show the caller for a final mode, one per web page or local
 * document (local items are titled by their document).
 *
 * Web-grounded answers cite only the web items: the local items were judged
 * insufficient. Ungrounded and refused answers cite nothing.
 */
export function buildCitedSources(evidence: readonly EvidenceItem[], mode: ResponseMode): CitedSource[] {
  if (mode === "internal_llm_weights" || mode === "no_evidence_found") {
    return [];
  }

  const wantedKind = mode === "grounded_in_web" ? "live-web" : "local-file";
  const seen = new Set<string>();
  const cited: CitedSource[] = [];

  for (const item of evidence) {
    const key = citationKey(item);
    if (item.sourceKind !== wantedKind || seen.has(key)) continue;
    seen.add(key);
    cited.push({ title: item.title, url: item.url, sourceKind: item.sourceKind });
  }

  return cited;
}
