import { IIndexSearcher } from "../../domain/search/IIndexSearcher";
import { InternalError } from "../../shared/errors/InternalError";

/**
 * Returns all terms of `fieldName` starting with `searchTerm`, at most
 * `maxSuggestions` of them, in index order.
 */
export function getAllTermsPrefixedWith(
  searcher: IIndexSearcher,
  fieldName: string,
  searchTerm: string,
  maxSuggestions: number,
): string[] {
  const results: string[] = [];

  try {
    const terms = searcher.prefixTerms(fieldName, searchTerm);
    let term = terms.term();

    while (term !== null && results.length < maxSuggestions) {
      results.push(term);
      term = terms.next() ? terms.term() : null;
    }
  } catch (error) {
    throw InternalError.wrap("Failed to read index terms", error);
  }

  return results;
}
