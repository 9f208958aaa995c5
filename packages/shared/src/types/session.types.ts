export interface SessionContext {
  readonly sessionId: string;
  readonly startedAt: Date;
}

export interface QueryLogEntry {
  readonly sessionId: string;
  readonly timestamp: Date;
  readonly query: string;
  readonly answer: string;
  readonly topic: string;
  readonly sourceCount: number;
  readonly responseTimeSeconds: number;
  readonly success: boolean;
}

export interface QueryStatistics {
  readonly totalQueries: number;
  readonly successfulQueries: number;
  readonly successRate: number;
  readonly averageResponseTimeSeconds: number;
  readonly topTopics: readonly { readonly topic: string; readonly count: number }[];
  readonly queriesPerDay: Readonly<Record<string, number>>;
}
