export interface ParsedCommand {
  bin: string;
  args: string[];
  /** Leading KEY=value assignments */
  env: Record<string, string>;
  raw: string;
}
