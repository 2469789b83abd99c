import fs from "fs/promises";
import { z } from "zod";
import { ILogger } from "../logging/ILogger";
import { InternalError } from "../../shared/errors/InternalError";
import { InMemoryTermIndex } from "./InMemoryTermIndex";

const indexFileSchema = z.array(z.record(z.string()));

/**
 * Load the suggestion index from a JSON array of documents
 */
export async function loadTermIndex(
  filePath: string,
  logger: ILogger,
): Promise<InMemoryTermIndex> {
  logger.info("Loading term index", { filePath });

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (error) {
    const failure = InternalError.wrap("Failed to read term index", error);
    logger.error("Term index could not be read", failure, { filePath });
    throw failure;
  }

  const parsed = indexFileSchema.safeParse(raw);
  if (!parsed.success) {
    const failure = new InternalError(
      `Invalid term index file ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      parsed.error,
    );
    logger.error("Term index is malformed", failure, { filePath });
    throw failure;
  }

  const index = InMemoryTermIndex.fromDocuments(parsed.data);
  logger.info("Term index loaded", {
    documents: parsed.data.length,
    fields: index.fieldNames(),
  });
  return index;
}
