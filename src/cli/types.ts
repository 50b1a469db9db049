/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
}

/**
 * Options shared by the commands that read input files
 */
export interface ReadCommandOptions {
  contentType?: string;
  lookaheadBytes?: number;
}
