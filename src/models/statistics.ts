export interface UsageCounters {
  images: number;
  originalBytes: number;
  convertedBytes: number;
}

export interface StatisticsRecord {
  totalImages: number;
  totalOriginalBytes: number;
  totalConvertedBytes: number;
  byFormat: Record<string, number>;
  byDay: Record<string, UsageCounters>;
  byMonth: Record<string, UsageCounters>;
}

export const STATISTICS_SCOPES = ["today", "month", "all"] as const;
export type StatisticsScope = (typeof STATISTICS_SCOPES)[number];

export type StatisticsQueryResult =
  | {
      scope: "today" | "month";
      period: string;
      counters: UsageCounters;
    }
  | {
      scope: "all";
      counters: UsageCounters;
      byFormat: Record<string, number>;
    };

export function emptyCounters(): UsageCounters {
  return { images: 0, originalBytes: 0, convertedBytes: 0 };
}

export function emptyStatistics(): StatisticsRecord {
  return {
    totalImages: 0,
    totalOriginalBytes: 0,
    totalConvertedBytes: 0,
    byFormat: {},
    byDay: {},
    byMonth: {},
  };
}
