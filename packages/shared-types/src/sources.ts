export interface ReferenceTitleCollection {
  allTitles: Set<string>;
  /** Only sources whose fetch succeeded, in fetch order */
  titlesBySource: Map<string, Set<string>>;
  failedSources: string[];
}

export interface SourceExpansionOptions {
  homebrew: boolean;
  japan: boolean;
}
