import type { SearchResult } from '@vecsync/shared';

export function formatResults(results: SearchResult[]): string {
  if (results.length === 0) return 'No results.';
  return results
    .map((r, i) => `${i + 1}. [${r.id}] distance=${r.distance.toFixed(4)}\n   ${r.document}`)
    .join('\n');
}
