import type { FundingRow } from '../types/domain.js';
import { logger } from '../utils/logger.js';
import { toNumberOrNull } from '../utils/numeric.js';
import type { PremiumIndexEntry } from '../utils/validators.js';

export { toNumberOrNull };

export function extractFundingRates(entries: readonly PremiumIndexEntry[]): FundingRow[] {
  const rows = entries.map((d) => ({
    symbol: d.symbol,
    fundingRate: toNumberOrNull(d.lastFundingRate),
  }));

  const missing = rows.filter((r) => r.fundingRate === null).length;
  if (missing) logger.debug({ missing, total: rows.length }, 'funding rates without a numeric value');

  return rows;
}
