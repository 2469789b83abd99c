import { LexiconFields } from "../entities/LexiconDefinition";

export enum LexiconField {
  Transliteration = "transliteration",
  ShortGloss = "shortGloss",
  OriginalSpelling = "originalSpelling",
}

export function extractField(
  definition: LexiconFields,
  field: LexiconField,
): string {
  switch (field) {
    case LexiconField.Transliteration:
      return definition.simpleTransliteration;
    case LexiconField.ShortGloss:
      return definition.shortDefinition;
    case LexiconField.OriginalSpelling:
      return definition.original;
  }
}
