/**
 * Options accepted by the root command and visible to every subcommand.
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
  /** Directory holding cached documents and their state files */
  cacheDir?: string;
}
