/**
 * Term enumerator positioned on the first term of a prefix range.
 *
 * `term()` is null once the enumerator is exhausted (or when nothing
 * matched to begin with). `next()` advances and reports whether a term is
 * now current.
 */
export interface TermEnum {
  term(): string | null;
  next(): boolean;
}

/**
 * Handle on a full-text term index
 */
export interface IIndexSearcher {
  prefixTerms(fieldName: string, prefix: string): TermEnum;
}
