/**
 * Identity of the company whose signals are collected. Treated as immutable input for a whole run.
 */
export type CompanyTarget = {
  readonly name: string;
  readonly industry?: string;
  readonly domain?: string;
  readonly city?: string;
  readonly aliases: readonly string[];
};

/**
 * Describes the client whose interests define what "relevant" means for a run.
 */
export type ClientProfile = {
  readonly keywords: readonly string[];
  readonly description?: string;
};
