import {
  IIndexSearcher,
  TermEnum,
} from "../../domain/search/IIndexSearcher";

/** One indexed document: field name -> field text */
export type IndexDocument = Record<string, string>;

export type Tokenizer = (text: string) => string[];

export const lowerCaseTokenizer: Tokenizer = (text) =>
  text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);

/**
 * Walks a sorted term list from the first term >= prefix while terms still
 * start with the prefix.
 */
class PrefixTermEnum implements TermEnum {
  constructor(
    private readonly terms: readonly string[],
    private position: number,
    private readonly prefix: string,
  ) {}

  term(): string | null {
    const current = this.terms[this.position];
    return current !== undefined && current.startsWith(this.prefix)
      ? current
      : null;
  }

  next(): boolean {
    if (this.term() === null) {
      return false;
    }
    this.position++;
    return this.term() !== null;
  }
}

function lowerBound(terms: readonly string[], target: string): number {
  let low = 0;
  let high = terms.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (terms[mid] < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * In-memory term dictionary
 *
 * Keeps, per field, the sorted distinct terms seen in the indexed documents.
 */
export class InMemoryTermIndex implements IIndexSearcher {
  private readonly fields: Map<string, string[]>;

  private constructor(fields: Map<string, string[]>) {
    this.fields = fields;
  }

  /**
   * Build from raw term lists, one per field (terms are used verbatim)
   */
  static fromTerms(termsByField: Record<string, string[]>): InMemoryTermIndex {
    const fields = new Map<string, string[]>();
    for (const [field, terms] of Object.entries(termsByField)) {
      fields.set(field, Array.from(new Set(terms)).sort());
    }
    return new InMemoryTermIndex(fields);
  }

  static fromDocuments(
    documents: readonly IndexDocument[],
    tokenize: Tokenizer = lowerCaseTokenizer,
  ): InMemoryTermIndex {
    const termsByField: Record<string, string[]> = {};
    for (const document of documents) {
      for (const [field, text] of Object.entries(document)) {
        const terms = termsByField[field] ?? [];
        terms.push(...tokenize(text));
        termsByField[field] = terms;
      }
    }
    return InMemoryTermIndex.fromTerms(termsByField);
  }

  prefixTerms(fieldName: string, prefix: string): TermEnum {
    const terms = this.fields.get(fieldName) ?? [];
    return new PrefixTermEnum(terms, lowerBound(terms, prefix), prefix);
  }

  fieldNames(): string[] {
    return Array.from(this.fields.keys());
  }

  termCount(fieldName: string): number {
    return this.fields.get(fieldName)?.length ?? 0;
  }
}
