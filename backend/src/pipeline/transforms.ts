import type { Instant } from './instant.js';
import type { TransactionRecord } from './types.js';

export type RegionRiskRow = {
  location_region: string;
  avg_risk_score: number | null;
};

export type LastSaleRow = {
  receiving_address: string | null;
  amount: number;
  timestamp: Instant;
};

export const TOP_RECENT_SALES_LIMIT = 3;

/**
 * Mean risk score per region, highest first. Regions without any score average to null
 * and sort last; equal averages keep the order in which regions first appear.
 */
export function regionRiskAverage(records: readonly TransactionRecord[]): RegionRiskRow[] {
  const groups = new Map<string, { sum: number; count: number }>();
  for (const record of records) {
    if (record.location_region === null) continue;
    let group = groups.get(record.location_region);
    if (!group) {
      group = { sum: 0, count: 0 };
      groups.set(record.location_region, group);
    }
    if (record.risk_score !== null) {
      group.sum += record.risk_score;
      group.count += 1;
    }
  }

  const rows = Array.from(groups, ([location_region, group]) => ({
    location_region,
    avg_risk_score: group.count ? group.sum / group.count : null,
  }));

  return rows.sort((a, b) => {
    if (a.avg_risk_score === null) return b.avg_risk_score === null ? 0 : 1;
    if (b.avg_risk_score === null) return -1;
    return b.avg_risk_score - a.avg_risk_score;
  });
}

/**
 * Latest sale per receiving address (null addresses share one partition). Equal
 * timestamps resolve to the earliest row; partitions keep first-appearance order.
 */
export function lastSalePerAddress(records: readonly TransactionRecord[]): LastSaleRow[] {
  const latest = new Map<string | null, TransactionRecord>();
  for (const record of records) {
    if (record.transaction_type !== 'sale') continue;
    const current = latest.get(record.receiving_address);
    if (!current || record.timestamp.compare(current.timestamp) > 0) {
      latest.set(record.receiving_address, record);
    }
  }
  return Array.from(latest.values(), (record) => ({
    receiving_address: record.receiving_address,
    amount: record.amount,
    timestamp: record.timestamp,
  }));
}

/** Largest amounts first; ties keep the order of `lastSales`. */
export function topRecentSales(lastSales: readonly LastSaleRow[], limit = TOP_RECENT_SALES_LIMIT): LastSaleRow[] {
  return [...lastSales].sort((a, b) => b.amount - a.amount).slice(0, limit);
}
