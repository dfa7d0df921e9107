/**
 * Options for a single fetch session
 */
export interface FetchOptions {
  bucket: string;
  filters: string[];
  workingDir: string;
  verbose?: boolean;
}
