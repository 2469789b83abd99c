import { ValidationError } from "../../../shared/errors/DomainError";
import { MalformedKeyPolicy } from "../../../shared/config/IConfig";
import { ILogger } from "../../../infrastructure/logging/ILogger";

export interface StrongKeyParserOptions {
  /** Recognized token prefixes, matched case-sensitively */
  prefixes: readonly string[];
  separators: RegExp;
  /** Digits in the numeric part of a key */
  padWidth: number;
  malformedKeyPolicy: MalformedKeyPolicy;
}

export const DEFAULT_KEY_PARSER_OPTIONS: StrongKeyParserOptions = {
  prefixes: ["strong:", "STRONG:"],
  separators: /[ ,]+/,
  padWidth: 4,
  malformedKeyPolicy: "skip",
};

const DIGITS = /^\d+$/;

/**
 * Pads a strong number with the correct number of 0s.
 *
 * `G123` and `strong:G123` (with `prefixLength` 7) both become `G0123`.
 * Returns null when the part after the letter is not a number that fits in
 * `padWidth` digits.
 */
export function padStrongNumber(
  strongNumber: string,
  prefixLength = 0,
  padWidth = DEFAULT_KEY_PARSER_OPTIONS.padWidth,
): string | null {
  const letter = strongNumber.charAt(prefixLength);
  const digits = strongNumber.substring(prefixLength + 1);

  if (!/^[A-Za-z]$/.test(letter) || !DIGITS.test(digits)) {
    return null;
  }

  const value = parseInt(digits, 10);
  if (value >= 10 ** padWidth) {
    return null;
  }

  return `${letter.toUpperCase()}${String(value).padStart(padWidth, "0")}`;
}

/**
 * Strong Key Parser
 *
 * Splits a compound vocabulary identifier ("strong:G123 strong:H45") into
 * normalized lookup keys. Tokens without a recognized prefix are dropped.
 */
export class StrongKeyParser {
  private readonly options: StrongKeyParserOptions;

  constructor(
    private readonly logger: ILogger,
    options: Partial<StrongKeyParserOptions> = {},
  ) {
    this.options = { ...DEFAULT_KEY_PARSER_OPTIONS, ...options };
  }

  parse(vocabIdentifiers: string): string[] {
    const keys: string[] = [];

    for (const token of vocabIdentifiers.split(this.options.separators)) {
      const prefix = this.options.prefixes.find((p) => token.startsWith(p));
      if (!prefix || token.length <= prefix.length + 1) {
        continue;
      }

      const key = padStrongNumber(token, prefix.length, this.options.padWidth);
      if (key) {
        keys.push(key);
        continue;
      }

      if (this.options.malformedKeyPolicy === "reject") {
        throw new ValidationError(
          `Malformed strong number: ${token}`,
          "vocabIdentifiers",
        );
      }
      this.logger.warn("Skipping malformed strong number", { token });
    }

    return keys;
  }
}
