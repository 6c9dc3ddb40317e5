// ============================================================
// SOURCE LOCATION
// ============================================================

/** Zero-based position in source text; offset is the absolute character index */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}
