/**
 * A field extraction strategy for one kind of document.
 *
 * Implementations are pure: the same text always yields the same fields,
 * and a missing pattern yields null fields, never an error.
 */
export interface FieldExtractor<TFields extends object> {
  /** Short identifier used in logs */
  readonly name: string;

  /** Extract the fields from the full text of a document */
  extract(text: string): TFields;

  /** One-line, human-readable summary for progress output */
  summarize(fields: TFields): string;
}
