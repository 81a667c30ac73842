import type { CardId, MtgoId } from '../types';

export function scryfallEndpoints(baseUrl: string) {
  const base = baseUrl.replace(/\/+$/, '');
  return {
    cardById: (id: CardId) => `${base}/cards/${encodeURIComponent(id)}`,
    cardByName: (name: string) => `${base}/cards/named?${new URLSearchParams({ exact: name }).toString()}`,
    cardByMtgoId: (mtgoId: MtgoId) => `${base}/cards/mtgo/${mtgoId}`,
    bulkManifest: () => `${base}/bulk-data`,
  };
}

export type ScryfallEndpoints = ReturnType<typeof scryfallEndpoints>;
