/**
 * Configuration types for the cohort registry.
 *
 * Loaded from YAML at boot time. Every key has a default, so a missing file
 * or a partial file is valid.
 */

export interface RegistryConfig {
  version: string;
  jobs: {
    /** Reject status changes out of complete, cancelled and error. */
    strictTransitions: boolean;
  };
  exports: {
    /** Org unit stamped on export receipts that don't name one. */
    defaultOrgUnit: string;
  };
}
