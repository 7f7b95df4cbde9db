/**
 * Port for the version-control step that follows a successful commit.
 * The store never calls it; the CLI does, after reporting the commit.
 */
export interface IRepositorySync {
  /** @returns whether anything was recorded */
  record(message: string): boolean;
}
