export interface IDatasetExporter {
  /** Regenerates the spreadsheet mirror and returns its path. */
  export(): Promise<string>;
}
