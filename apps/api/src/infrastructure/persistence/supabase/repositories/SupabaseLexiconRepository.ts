import { injectable, inject } from "tsyringe";
import { ILexiconRepository } from "../../../../domain/lexicon/repositories/ILexiconRepository";
import {
  LexiconDefinition,
  LexiconFields,
} from "../../../../domain/lexicon/entities/LexiconDefinition";
import { SupabaseClient } from "../SupabaseClient";
import { ILogger } from "../../../logging/ILogger";
import { TYPES } from "../../../../di/types";
import { InternalError } from "../../../../shared/errors/InternalError";

interface DbLexiconDefinition {
  strong_number: string;
  original: string | null;
  short_definition: string | null;
  simple_transliteration: string | null;
  medium_definition: string | null;
  pronunciation: string | null;
}

type DbLexiconFields = Pick<
  DbLexiconDefinition,
  "original" | "short_definition" | "simple_transliteration"
>;

const TABLE = "lexicon_definitions";
const FIELD_COLUMNS = "original,short_definition,simple_transliteration";

/**
 * Supabase implementation of Lexicon Repository
 *
 * Reads lexicon definitions with a single `in` filter on the primary key.
 * Failures are not retried: they surface as InternalError.
 */
@injectable()
export class SupabaseLexiconRepository implements ILexiconRepository {
  private client;

  constructor(
    @inject(TYPES.SupabaseClient) supabaseClient: SupabaseClient,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    this.client = supabaseClient.getClient();
  }

  async findByKeys(keys: readonly string[]): Promise<LexiconDefinition[]> {
    if (keys.length === 0) {
      return [];
    }

    this.logger.debug("Finding lexicon definitions", { keys });

    const { data, error } = await this.client
      .from(TABLE)
      .select("*")
      .in("strong_number", [...keys]);

    if (error) {
      const failure = InternalError.wrap("Lexicon lookup failed", error);
      this.logger.error("Error finding lexicon definitions", failure, { keys });
      throw failure;
    }

    const rows: DbLexiconDefinition[] = data ?? [];
    return rows.map((row) => this.toDomain(row));
  }

  async findFieldsByKeys(keys: readonly string[]): Promise<LexiconFields[]> {
    if (keys.length === 0) {
      return [];
    }

    this.logger.debug("Finding lexicon fields", { keys });

    const { data, error } = await this.client
      .from(TABLE)
      .select(FIELD_COLUMNS)
      .in("strong_number", [...keys]);

    if (error) {
      const failure = InternalError.wrap("Lexicon lookup failed", error);
      this.logger.error("Error finding lexicon fields", failure, { keys });
      throw failure;
    }

    const rows: DbLexiconFields[] = data ?? [];
    return rows.map((row) => this.toFields(row));
  }

  private toFields(row: DbLexiconFields): LexiconFields {
    return {
      original: row.original ?? "",
      shortDefinition: row.short_definition ?? "",
      simpleTransliteration: row.simple_transliteration ?? "",
    };
  }

  private toDomain(row: DbLexiconDefinition): LexiconDefinition {
    return {
      strongNumber: row.strong_number,
      ...this.toFields(row),
      mediumDefinition: row.medium_definition,
      pronunciation: row.pronunciation,
    };
  }
}
