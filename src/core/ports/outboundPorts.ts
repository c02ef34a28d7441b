import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";

/**
 * Persisted form of a validated page pattern.
 */
export type StoredPagePattern = {
  signature: string;
  source: string;
  registeredAt: string;
};

export interface PagePatternStorePort {
  loadAll(): Promise<Result<StoredPagePattern[], AppBoundaryError>>;
  save(entry: StoredPagePattern): Promise<Result<void, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}
