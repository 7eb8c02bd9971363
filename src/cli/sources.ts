import type { Citation } from "../query/askAi";

/**
 * One line per distinct citation label, in citation order. Chunks that share a label
 * (same section and pages) are listed once with all of their markers.
 */
export function formatSourceLines(citations: Citation[]): string[] {
    const markersByLabel = new Map<string, number[]>();
    for (const citation of citations) {
        const markers = markersByLabel.get(citation.label);
        if (markers) {
            markers.push(citation.marker);
        } else {
            markersByLabel.set(citation.label, [citation.marker]);
        }
    }

    return [...markersByLabel].map(([label, markers]) => `  [${markers.join(", ")}] ${label}`);
}
