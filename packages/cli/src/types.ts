/** Options accepted before the subcommand name. */
export type GlobalOptions = {
  config?: string;
  json?: boolean;
  verbose?: boolean;
};
