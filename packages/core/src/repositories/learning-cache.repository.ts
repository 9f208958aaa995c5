export type DomainCounts = Readonly<Record<string, number>>;

/** Whole-mapping storage for the learning cache. */
export interface LearningCacheRepository {
  /** Resolves to an empty mapping when nothing has been stored yet. */
  read(): Promise<DomainCounts>;
  /** Replaces the stored mapping. */
  write(counts: DomainCounts): Promise<void>;
}
