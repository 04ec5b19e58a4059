export const RULEBOOKS_DIR = "rulebooks";
export const YAML_EXTENSIONS: readonly string[] = [".yml", ".yaml"];

export type RulebookRecord = {
  /** Path relative to the repository root, `/` separated. */
  relpath: string;
  /** Path relative to the rulebooks directory, `/` separated. */
  name: string;
  rawContent: string;
  content: unknown[];
};

export type ExpandedSource = {
  name: string;
  type: string;
  source: string;
  config: unknown;
  filters?: unknown[];
};

export type ExpandedSources = Map<string, ExpandedSource[]>;
